import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { EmailConfig } from "../env";
import { errorMessage, NotificationError } from "../errors";
import type { NotificationMessage, Notifier } from "./types";

export class EmailNotifier implements Notifier {
  readonly channel = "email" as const;
  private readonly config: EmailConfig;
  private readonly transporter: Transporter;

  constructor(config: EmailConfig, timeoutMs = 15_000) {
    this.config = config;
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: config.user ? { user: config.user, pass: config.pass } : undefined,
      connectionTimeout: timeoutMs,
    });
  }

  async send({ title, text }: NotificationMessage): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: this.config.to,
        subject: `${this.config.subject} — ${title}`,
        text,
      });
    } catch (err) {
      throw new NotificationError(this.channel, errorMessage(err));
    }
  }
}
