import { describe, expect, it, vi } from "vitest";
import type { ScannerConfig } from "./env";
import { NotificationError } from "./errors";
import type { KlinesFetcher } from "./get-candles";
import type { Candle } from "./indicators/types";
import type { NotificationMessage, Notifier } from "./notify";
import { exitCodeFor, runScan, scanSymbol } from "./scanner";
import type { SymbolConfig } from "./symbols";

const now = () => new Date("2026-10-19T08:30:00Z");

function candles(closes: number[]): Candle[] {
  return closes.map((close, i) => ({
    timestamp: 1_790_000_000_000 + i * 900_000,
    open: close,
    high: close,
    low: close,
    close,
    volume: 10,
  }));
}

const falling = Array.from({ length: 25 }, (_, i) => 200 - i);

function fakeFetcher(series: Record<string, number[]>): KlinesFetcher {
  return async (ticker, interval) => candles(series[`${ticker}|${interval}`] ?? []);
}

const symbol = (name: string, tickers: string[]): SymbolConfig => ({
  name,
  tickers,
  interval: "15m",
  range: "5d",
  htfInterval: "60m",
  htfRange: "10d",
});

const NAS100 = symbol("NAS100", ["^NDX"]);
const GOLD = symbol("GOLD", ["GC=F"]);

function makeConfig(overrides: Partial<ScannerConfig> = {}): ScannerConfig {
  return {
    channels: ["telegram"],
    telegram: { botToken: "test-token", chatId: "42" },
    symbolsFile: "/work/config/symbols.json",
    only: [],
    classifier: { thresholdPct: 0.5, window: 3, minCandles: 3, emaPeriod: 9 },
    htfBias: false,
    reportMode: "combined",
    fetch: { baseUrl: "https://example.test", timeoutMs: 1000, retryOnce: false, retryDelayMs: 0 },
    dryRun: false,
    logLevel: "error",
    ...overrides,
  };
}

class RecordingNotifier implements Notifier {
  readonly channel = "telegram" as const;
  readonly sent: NotificationMessage[] = [];

  constructor(private readonly fail = false) {}

  async send(message: NotificationMessage): Promise<void> {
    if (this.fail) throw new NotificationError(this.channel, "HTTP 401 - Unauthorized");
    this.sent.push(message);
  }
}

const fetchKlines = fakeFetcher({ "^NDX|15m": [100, 100.5, 101.2], "^NDX|60m": falling });

describe("scanSymbol", () => {
  it("classifies the first ticker with data", async () => {
    const report = await scanSymbol(NAS100, makeConfig(), fetchKlines);
    expect(report).toMatchObject({ symbol: "NAS100", ticker: "^NDX", finalDirection: "Buy" });
    expect(report.signal).toMatchObject({ direction: "Buy", wave: "Impulse", score: 4 });
    expect(report.htfBias).toBeUndefined();
  });

  it("lets the higher timeframe overrule a conflicting short signal", async () => {
    const report = await scanSymbol(NAS100, makeConfig({ htfBias: true }), fetchKlines);
    expect(report.signal?.direction).toBe("Buy");
    expect(report.htfBias).toBe("Sell");
    expect(report.finalDirection).toBe("Sell");
  });

  it("keeps the short direction when the higher timeframe has no data", async () => {
    const short = fakeFetcher({ "^NDX|15m": [100, 100.5, 101.2] });
    const report = await scanSymbol(NAS100, makeConfig({ htfBias: true }), short);
    expect(report.htfBias).toBe("Neutral");
    expect(report.finalDirection).toBe("Buy");
  });

  it("reports symbols without data", async () => {
    await expect(scanSymbol(GOLD, makeConfig(), fetchKlines)).resolves.toEqual({
      symbol: "GOLD",
      error: "No price data for any ticker in [GC=F] (GC=F: no data)",
    });
  });
});

describe("runScan", () => {
  it("sends one combined report", async () => {
    const notifier = new RecordingNotifier();

    const result = await runScan(makeConfig(), [NAS100, GOLD], { fetchKlines, notifiers: [notifier], now });

    expect(notifier.sent).toHaveLength(1);
    expect(notifier.sent[0].title).toBe("2026-10-19 08:30 UTC");
    expect(notifier.sent[0].text.split("\n")).toEqual([
      "Impulse Scanner report — 2026-10-19 08:30 UTC — Session: London",
      "",
      "📡 NAS100 (^NDX)",
      "📈 Last: 101.2",
      "🧭 Bias: Buy",
      "🌊 Wave: Impulse (score 4)",
      "📐 Move: +1.20% | EMA slope: n/a",
      "💡 Reason: move +1.20% over 3 bars; monotonic up; breaks prior high",
      "",
      "❌ GOLD: No price data for any ticker in [GC=F] (GC=F: no data)",
    ]);
    expect(result.deliveries).toEqual([{ channel: "telegram", ok: true }]);
    expect(exitCodeFor(result, false)).toBe(0);
  });

  it("sends per-symbol messages and a run summary", async () => {
    const notifier = new RecordingNotifier();

    await runScan(makeConfig({ reportMode: "per-symbol" }), [NAS100, GOLD], {
      fetchKlines,
      notifiers: [notifier],
      now,
    });

    expect(notifier.sent.map((m) => m.title)).toEqual(["NAS100", "run summary"]);
    expect(notifier.sent[0].text.split("\n").slice(0, 3)).toEqual([
      "📡 NAS100 (^NDX)",
      "🕒 UTC 2026-10-19 08:30",
      "🔎 Session: London",
    ]);
    expect(notifier.sent[1].text).toBe(
      [
        "Impulse scanner run complete:",
        "✅ NAS100: sent (score 4)",
        "❌ GOLD: No price data for any ticker in [GC=F] (GC=F: no data)",
      ].join("\n"),
    );
  });

  it("records a ticker failure and keeps going", async () => {
    const flaky: KlinesFetcher = async (ticker, interval, range) => {
      if (ticker === "GC=F") throw new TypeError("boom");
      return fetchKlines(ticker, interval, range);
    };
    const notifier = new RecordingNotifier();

    const result = await runScan(makeConfig(), [GOLD, NAS100], { fetchKlines: flaky, notifiers: [notifier], now });

    expect(result.reports.map((r) => r.symbol)).toEqual(["GOLD", "NAS100"]);
    expect(result.reports[0].error).toBe("No price data for any ticker in [GC=F] (GC=F: boom)");
    expect(result.reports[1].finalDirection).toBe("Buy");
  });

  it("records a symbol whose candles cannot be read and keeps going", async () => {
    const corrupt: KlinesFetcher = async (ticker, interval, range) => {
      if (ticker !== "GC=F") return fetchKlines(ticker, interval, range);
      const row: Candle = {
        timestamp: 0,
        open: 1,
        high: 1,
        low: 1,
        get close(): number {
          throw new RangeError("corrupt row");
        },
        volume: 0,
      };
      return [row];
    };

    const result = await runScan(makeConfig(), [GOLD, NAS100], {
      fetchKlines: corrupt,
      notifiers: [new RecordingNotifier()],
      now,
    });

    expect(result.reports[0]).toEqual({ symbol: "GOLD", error: "error processing: corrupt row" });
    expect(result.reports[1].finalDirection).toBe("Buy");
  });

  it("says printed in the dry-run summary", async () => {
    const print = vi.fn<(text: string) => void>();

    await runScan(makeConfig({ dryRun: true, reportMode: "per-symbol" }), [NAS100], {
      fetchKlines,
      notifiers: [],
      now,
      print,
    });

    expect(print).toHaveBeenCalledTimes(2);
    expect(print.mock.calls[1][0]).toBe("Impulse scanner run complete:\n✅ NAS100: printed (score 4)");
  });

  it("exits non-zero when every delivery fails", async () => {
    const result = await runScan(makeConfig(), [NAS100], {
      fetchKlines,
      notifiers: [new RecordingNotifier(true)],
      now,
    });

    expect(result.deliveries).toEqual([
      { channel: "telegram", ok: false, error: "telegram: HTTP 401 - Unauthorized" },
    ]);
    expect(exitCodeFor(result, false)).toBe(1);
  });

  it("prints instead of sending on a dry run", async () => {
    const print = vi.fn<(text: string) => void>();
    const notifier = new RecordingNotifier();

    const result = await runScan(makeConfig({ dryRun: true }), [NAS100], {
      fetchKlines,
      notifiers: [notifier],
      now,
      print,
    });

    expect(print).toHaveBeenCalledTimes(1);
    expect(print.mock.calls[0][0]).toMatch(/^Impulse Scanner report — 2026-10-19 08:30 UTC/);
    expect(notifier.sent).toEqual([]);
    expect(result.deliveries).toEqual([]);
    expect(exitCodeFor(result, true)).toBe(0);
  });
});
