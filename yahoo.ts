import axios from "axios";
import qs from "qs";
import { z } from "zod";
import { MarketDataError } from "./errors";
import type { Candle } from "./indicators/types";

export const YAHOO_BASE = "https://query1.finance.yahoo.com";

export const SUPPORTED_INTERVALS = [
  "1m",
  "2m",
  "5m",
  "15m",
  "30m",
  "60m",
  "90m",
  "1h",
  "1d",
  "5d",
  "1wk",
  "1mo",
  "3mo",
] as const;

export type YahooInterval = (typeof SUPPORTED_INTERVALS)[number];

export function isSupportedInterval(interval: string): interval is YahooInterval {
  return SUPPORTED_INTERVALS.some((i) => i === interval);
}

const series = z.array(z.number().nullable()).optional();

const ChartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({ open: series, high: series, low: series, close: series, volume: series }),
            ),
          }),
        }),
      )
      .nullable(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .nullable()
      .optional(),
  }),
});

export type YahooOptions = { baseUrl?: string; timeoutMs?: number };

function describeHttpError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const payload = ChartSchema.safeParse(err.response?.data);
    const detail = payload.success ? payload.data.chart.error?.description : undefined;
    const status = err.response?.status;
    const head = status ? `HTTP ${status}` : (err.code ?? "request failed");
    return `${head} - ${detail ?? err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Candles do endpoint de chart do Yahoo Finance, do mais antigo ao mais novo.
 * Barras sem fechamento são descartadas; array vazio = o provedor não tinha
 * nada para o ticker/range.
 */
export async function getKlines(
  ticker: string,
  interval: string,
  range: string,
  { baseUrl = YAHOO_BASE, timeoutMs = 15_000 }: YahooOptions = {},
): Promise<Candle[]> {
  if (!isSupportedInterval(interval)) {
    throw new MarketDataError(ticker, `unsupported interval: ${interval}`);
  }

  const query = qs.stringify({ interval, range, includePrePost: false });
  const url = `${baseUrl}/v8/finance/chart/${encodeURIComponent(ticker)}?${query}`;

  let body: unknown;
  try {
    const { data } = await axios.get<unknown>(url, {
      timeout: timeoutMs,
      headers: { "User-Agent": "Mozilla/5.0 (impulse-scanner)" },
    });
    body = data;
  } catch (err) {
    throw new MarketDataError(ticker, describeHttpError(err));
  }

  const parsed = ChartSchema.safeParse(body);
  if (!parsed.success) {
    throw new MarketDataError(ticker, "unexpected chart payload");
  }
  const { result, error } = parsed.data.chart;
  if (error) {
    throw new MarketDataError(ticker, error.description ?? error.code ?? "provider error");
  }

  const res = result?.[0];
  const quote = res?.indicators.quote[0];
  if (!res || !quote) return [];

  const rows: Candle[] = [];
  (res.timestamp ?? []).forEach((t, i) => {
    const close = quote.close?.[i];
    if (close == null || !Number.isFinite(close)) return;
    rows.push({
      timestamp: t * 1000,
      open: quote.open?.[i] ?? close,
      high: quote.high?.[i] ?? close,
      low: quote.low?.[i] ?? close,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  });

  return rows.sort((a, b) => a.timestamp - b.timestamp);
}
