import { describe, expect, it } from "vitest";
import type { ScannerConfig } from "../env";
import { NotificationError } from "../errors";
import { EmailNotifier } from "./email";
import { createNotifiers, dispatch, type NotificationMessage, type Notifier } from "./index";
import { TelegramNotifier } from "./telegram";

class FakeNotifier implements Notifier {
  readonly sent: NotificationMessage[] = [];

  constructor(
    readonly channel: Notifier["channel"],
    private readonly failWith?: string,
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    if (this.failWith) throw new NotificationError(this.channel, this.failWith);
    this.sent.push(message);
  }
}

describe("dispatch", () => {
  const message = { title: "t", text: "body" };

  it("sends on every channel and reports each outcome", async () => {
    const telegram = new FakeNotifier("telegram", "HTTP 401 - Unauthorized");
    const email = new FakeNotifier("email");

    const outcomes = await dispatch([telegram, email], message);

    expect(outcomes).toEqual([
      { channel: "telegram", ok: false, error: "telegram: HTTP 401 - Unauthorized" },
      { channel: "email", ok: true },
    ]);
    expect(email.sent).toEqual([message]);
  });

  it("returns nothing without channels", async () => {
    await expect(dispatch([], message)).resolves.toEqual([]);
  });
});

describe("createNotifiers", () => {
  it("builds one notifier per configured channel, in order", () => {
    const config: Pick<ScannerConfig, "channels" | "telegram" | "email" | "fetch"> = {
      channels: ["email", "telegram"],
      telegram: { botToken: "test-token", chatId: "42" },
      email: {
        host: "smtp.example.test",
        port: 587,
        secure: false,
        from: "scanner@example.test",
        to: "desk@example.test",
        subject: "Impulse Scanner report",
      },
      fetch: { baseUrl: "https://example.test", timeoutMs: 1000, retryOnce: false, retryDelayMs: 0 },
    };

    const notifiers = createNotifiers(config);

    expect(notifiers.map((n) => n.channel)).toEqual(["email", "telegram"]);
    expect(notifiers[0]).toBeInstanceOf(EmailNotifier);
    expect(notifiers[1]).toBeInstanceOf(TelegramNotifier);
  });
});
