import { setTimeout as sleep } from "node:timers/promises";
import type { FetchConfig } from "./env";
import { errorMessage } from "./errors";
import type { Candle } from "./indicators/types";
import { childLogger } from "./logger";
import { getKlines as getKlinesYahoo } from "./yahoo";

const log = childLogger("market-data");

export type KlinesFetcher = (ticker: string, interval: string, range: string) => Promise<Candle[]>;

export type ProbeAttempt = {
  ticker: string;
  attempt: number; // 1 = primeira tentativa, 2 = a única repetição
  bars: number;
  error?: string;
};

export type ProbeResult =
  | { ok: true; ticker: string; candles: Candle[]; attempts: ProbeAttempt[] }
  | { ok: false; reason: string; attempts: ProbeAttempt[] };

export type ProbeOptions = {
  fetchKlines: KlinesFetcher;
  retryOnce?: boolean; // default true
  retryDelayMs?: number; // default 1000
};

export function createYahooFetcher({ baseUrl, timeoutMs }: FetchConfig): KlinesFetcher {
  return (ticker, interval, range) => getKlinesYahoo(ticker, interval, range, { baseUrl, timeoutMs });
}

/**
 * Testa os tickers em ordem e devolve o primeiro que trouxer candles.
 * Cada ticker tem uma tentativa e, com `retryOnce`, mais uma repetição.
 */
export async function probeTickers(
  tickers: readonly string[],
  interval: string,
  range: string,
  { fetchKlines, retryOnce = true, retryDelayMs = 1000 }: ProbeOptions,
): Promise<ProbeResult> {
  const attempts: ProbeAttempt[] = [];
  const lastError = new Map<string, string>();
  const maxAttempts = retryOnce ? 2 : 1;

  for (const ticker of tickers) {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1 && retryDelayMs > 0) await sleep(retryDelayMs);
      try {
        const candles = await fetchKlines(ticker, interval, range);
        attempts.push({ ticker, attempt, bars: candles.length });
        if (candles.length) {
          log.debug("ticker resolved", { ticker, attempt, bars: candles.length });
          return { ok: true, ticker, candles, attempts };
        }
        lastError.set(ticker, "no data");
      } catch (err) {
        const message = errorMessage(err);
        attempts.push({ ticker, attempt, bars: 0, error: message });
        lastError.set(ticker, message);
      }
      log.warn("no candles", { ticker, attempt, error: lastError.get(ticker) });
    }
  }

  const detail = Array.from(lastError.entries())
    .map(([ticker, message]) => `${ticker}: ${message}`)
    .join("; ");
  return {
    ok: false,
    reason: `No price data for any ticker in [${tickers.join(", ")}]${detail ? ` (${detail})` : ""}`,
    attempts,
  };
}
