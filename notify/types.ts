import type { Channel } from "../env";

export type NotificationMessage = {
  title: string; // rótulo curto, vai no assunto do email
  text: string;
};

export type DeliveryOutcome = {
  channel: Channel;
  ok: boolean;
  error?: string;
};

export interface Notifier {
  readonly channel: Channel;

  /** Um único envio; rejeita com NotificationError em caso de falha. */
  send(message: NotificationMessage): Promise<void>;
}
