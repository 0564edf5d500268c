import axios from "axios";
import { z } from "zod";
import type { TelegramConfig } from "../env";
import { NotificationError } from "../errors";
import type { NotificationMessage, Notifier } from "./types";

export const TELEGRAM_API = "https://api.telegram.org";
export const TELEGRAM_MAX_LENGTH = 4096;

const SendMessageResponse = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Quebra nas linhas para cada pedaço caber numa mensagem do Telegram. */
export function splitMessage(text: string, max = TELEGRAM_MAX_LENGTH): string[] {
  if (text.length <= max) return [text];

  const chunks: string[] = [];
  let current = "";
  for (const line of text.split("\n")) {
    const pieces: string[] = [];
    if (line.length > max) {
      for (let i = 0; i < line.length; ) {
        let end = Math.min(i + max, line.length);
        // não corta um par surrogate (emoji) ao meio
        if (end < line.length && end - i > 1 && isHighSurrogate(line.charCodeAt(end - 1))) end -= 1;
        pieces.push(line.slice(i, end));
        i = end;
      }
    } else {
      pieces.push(line);
    }
    for (const piece of pieces) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length > max) {
        chunks.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

function describe(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const body = SendMessageResponse.safeParse(err.response?.data);
    const status = err.response?.status;
    const detail = body.success ? body.data.description : undefined;
    return `${status ? `HTTP ${status}` : (err.code ?? "request failed")} - ${detail ?? err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

export class TelegramNotifier implements Notifier {
  readonly channel = "telegram" as const;
  private readonly config: TelegramConfig;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: TelegramConfig, options: { baseUrl?: string; timeoutMs?: number } = {}) {
    this.config = config;
    this.baseUrl = options.baseUrl ?? TELEGRAM_API;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async send({ text }: NotificationMessage): Promise<void> {
    const url = `${this.baseUrl}/bot${this.config.botToken}/sendMessage`;
    const chunks = splitMessage(text);
    const fail = (sent: number, detail: string) =>
      new NotificationError(
        this.channel,
        sent ? `${detail} (${sent} of ${chunks.length} parts sent)` : detail,
      );

    for (const [sent, chunk] of chunks.entries()) {
      let data: unknown;
      try {
        const res = await axios.post<unknown>(
          url,
          { chat_id: this.config.chatId, text: chunk, disable_web_page_preview: true },
          { timeout: this.timeoutMs },
        );
        data = res.data;
      } catch (err) {
        throw fail(sent, describe(err));
      }
      const body = SendMessageResponse.safeParse(data);
      if (!body.success) throw fail(sent, "unexpected response");
      if (!body.data.ok) throw fail(sent, body.data.description ?? "Telegram API error");
    }
  }
}
