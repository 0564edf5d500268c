import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";

export type Channel = "telegram" | "email";
export type ReportMode = "combined" | "per-symbol";

export type TelegramConfig = { botToken: string; chatId: string };

export type EmailConfig = {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
  from: string;
  to: string;
  subject: string;
};

export type ClassifierConfig = {
  thresholdPct: number;
  window: number;
  minCandles: number;
  emaPeriod: number;
};

export type FetchConfig = {
  baseUrl: string;
  timeoutMs: number;
  retryOnce: boolean;
  retryDelayMs: number;
};

export type ScannerConfig = {
  channels: Channel[];
  telegram?: TelegramConfig;
  email?: EmailConfig;
  symbolsFile: string;
  only: string[]; // nomes amigáveis passados na linha de comando
  classifier: ClassifierConfig;
  htfBias: boolean;
  reportMode: ReportMode;
  fetch: FetchConfig;
  dryRun: boolean;
  logLevel: string;
};

// config/ fica ao lado das fontes, ou um nível acima quando compilado em dist/
export const DEFAULT_SYMBOLS_FILE =
  [resolve(__dirname, "config/symbols.json"), resolve(__dirname, "../config/symbols.json")].find((p) =>
    existsSync(p),
  ) ?? resolve(__dirname, "config/symbols.json");

const optStr = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const bool = (fallback: boolean) =>
  optStr.transform((v) => (v === undefined ? fallback : ["1", "true", "yes"].includes(v.toLowerCase())));

const num = (fallback: number, min: number) =>
  optStr.transform((v) => (v === undefined ? fallback : Number(v))).pipe(z.number().finite().min(min));

const int = (fallback: number, min: number) =>
  optStr.transform((v) => (v === undefined ? fallback : Number(v))).pipe(z.number().int().min(min));

const EnvSchema = z.object({
  NOTIFY_CHANNELS: optStr
    .transform((v) =>
      (v ?? "telegram")
        .split(",")
        .map((s) => s.trim().toLowerCase())
        .filter(Boolean),
    )
    .pipe(z.array(z.enum(["telegram", "email"])).min(1)),
  BOT_TOKEN: optStr,
  CHAT_ID: optStr,
  SMTP_HOST: optStr,
  SMTP_PORT: int(587, 1),
  SMTP_SECURE: bool(false),
  SMTP_USER: optStr,
  SMTP_PASS: optStr,
  EMAIL_FROM: optStr,
  EMAIL_TO: optStr,
  EMAIL_SUBJECT: optStr.transform((v) => v ?? "Impulse Scanner report"),
  SYMBOLS_FILE: optStr,
  THRESHOLD_PCT: num(0.5, 0),
  WINDOW: int(3, 2),
  MIN_CANDLES: int(3, 1),
  EMA_PERIOD: int(9, 2),
  HTF_BIAS: bool(true),
  REPORT_MODE: optStr.pipe(z.enum(["combined", "per-symbol"]).default("combined")),
  RETRY_ONCE: bool(true),
  RETRY_DELAY_MS: int(1000, 0),
  HTTP_TIMEOUT_MS: int(15000, 1),
  YAHOO_BASE_URL: optStr.pipe(z.string().url().default("https://query1.finance.yahoo.com")),
  DRY_RUN: bool(false),
  LOG_LEVEL: optStr.pipe(z.enum(["error", "warn", "info", "debug"]).default("info")),
});

/**
 * Monta a configuração a partir do ambiente e dos argumentos posicionais
 * (`impulse-scanner [SYMBOL...]`). Todos os problemas são juntados num único
 * {@link ConfigError}.
 */
export function getEnv(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2),
  cwd: string = process.cwd(),
): ScannerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }
  const e = parsed.data;
  const channels: Channel[] = Array.from(new Set(e.NOTIFY_CHANNELS));
  const problems: string[] = [];

  let telegram: TelegramConfig | undefined;
  if (channels.includes("telegram")) {
    if (e.BOT_TOKEN && e.CHAT_ID) {
      telegram = { botToken: e.BOT_TOKEN, chatId: e.CHAT_ID };
    } else if (!e.DRY_RUN) {
      if (!e.BOT_TOKEN) problems.push("BOT_TOKEN is required for the telegram channel");
      if (!e.CHAT_ID) problems.push("CHAT_ID is required for the telegram channel");
    }
  }

  let email: EmailConfig | undefined;
  if (channels.includes("email")) {
    if (e.SMTP_HOST && e.EMAIL_FROM && e.EMAIL_TO) {
      email = {
        host: e.SMTP_HOST,
        port: e.SMTP_PORT,
        secure: e.SMTP_SECURE,
        user: e.SMTP_USER,
        pass: e.SMTP_PASS,
        from: e.EMAIL_FROM,
        to: e.EMAIL_TO,
        subject: e.EMAIL_SUBJECT,
      };
    } else if (!e.DRY_RUN) {
      if (!e.SMTP_HOST) problems.push("SMTP_HOST is required for the email channel");
      if (!e.EMAIL_FROM) problems.push("EMAIL_FROM is required for the email channel");
      if (!e.EMAIL_TO) problems.push("EMAIL_TO is required for the email channel");
    }
  }

  if (problems.length) throw new ConfigError(problems);

  return {
    channels,
    telegram,
    email,
    symbolsFile: e.SYMBOLS_FILE ? resolve(cwd, e.SYMBOLS_FILE) : DEFAULT_SYMBOLS_FILE,
    only: argv.map((a) => a.trim().toUpperCase()).filter(Boolean),
    classifier: {
      thresholdPct: e.THRESHOLD_PCT,
      window: e.WINDOW,
      minCandles: e.MIN_CANDLES,
      emaPeriod: e.EMA_PERIOD,
    },
    htfBias: e.HTF_BIAS,
    reportMode: e.REPORT_MODE,
    fetch: {
      baseUrl: e.YAHOO_BASE_URL.replace(/\/$/, ""),
      timeoutMs: e.HTTP_TIMEOUT_MS,
      retryOnce: e.RETRY_ONCE,
      retryDelayMs: e.RETRY_DELAY_MS,
    },
    dryRun: e.DRY_RUN,
    logLevel: e.LOG_LEVEL,
  };
}
