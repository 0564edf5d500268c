import type { ScannerConfig } from "../env";
import { errorMessage } from "../errors";
import { childLogger } from "../logger";
import { EmailNotifier } from "./email";
import { TelegramNotifier } from "./telegram";
import type { DeliveryOutcome, NotificationMessage, Notifier } from "./types";

export type { DeliveryOutcome, NotificationMessage, Notifier } from "./types";

const log = childLogger("notify");

export function createNotifiers(
  config: Pick<ScannerConfig, "channels" | "telegram" | "email" | "fetch">,
): Notifier[] {
  const notifiers: Notifier[] = [];
  for (const channel of config.channels) {
    if (channel === "telegram" && config.telegram) {
      notifiers.push(new TelegramNotifier(config.telegram, { timeoutMs: config.fetch.timeoutMs }));
    } else if (channel === "email" && config.email) {
      notifiers.push(new EmailNotifier(config.email, config.fetch.timeoutMs));
    }
  }
  return notifiers;
}

/**
 * Envia a mensagem uma vez em cada canal, na ordem. Falhas são logadas e
 * voltam na lista de resultados (nunca rejeita).
 */
export async function dispatch(
  notifiers: readonly Notifier[],
  message: NotificationMessage,
): Promise<DeliveryOutcome[]> {
  const outcomes: DeliveryOutcome[] = [];
  for (const notifier of notifiers) {
    try {
      await notifier.send(message);
      log.info("delivered", { channel: notifier.channel, title: message.title });
      outcomes.push({ channel: notifier.channel, ok: true });
    } catch (err) {
      const error = errorMessage(err);
      log.error("delivery failed", { channel: notifier.channel, title: message.title, error });
      outcomes.push({ channel: notifier.channel, ok: false, error });
    }
  }
  return outcomes;
}
