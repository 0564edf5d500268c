import type { ScannerConfig } from "./env";
import { errorMessage } from "./errors";
import { probeTickers, type KlinesFetcher } from "./get-candles";
import { ImpulseIndicator } from "./indicators/impulse";
import { combineDirections, TrendBiasIndicator } from "./indicators/trend-bias";
import { toCandles, type TDirection } from "./indicators/types";
import { childLogger } from "./logger";
import { dispatch, type DeliveryOutcome, type NotificationMessage, type Notifier } from "./notify";
import {
  formatReport,
  formatRunSummary,
  formatSymbolMessage,
  type SymbolOutcome,
  type SymbolReport,
} from "./report";
import type { SymbolConfig } from "./symbols";
import { formatUtc } from "./utils/session";

const log = childLogger("scanner");

export type ScanDeps = {
  fetchKlines: KlinesFetcher;
  notifiers: readonly Notifier[];
  now?: () => Date;
  print?: (text: string) => void; // saída do dry-run (default: stdout)
};

export type ScanResult = {
  reports: SymbolReport[];
  messages: NotificationMessage[]; // enviadas, ou impressas no dry-run
  deliveries: DeliveryOutcome[];
};

type ScanSettings = Pick<ScannerConfig, "classifier" | "htfBias" | "fetch">;

export async function scanSymbol(
  symbol: SymbolConfig,
  settings: ScanSettings,
  fetchKlines: KlinesFetcher,
): Promise<SymbolReport> {
  const probeOptions = {
    fetchKlines,
    retryOnce: settings.fetch.retryOnce,
    retryDelayMs: settings.fetch.retryDelayMs,
  };
  const probe = await probeTickers(symbol.tickers, symbol.interval, symbol.range, probeOptions);
  if (!probe.ok) {
    return { symbol: symbol.name, error: probe.reason };
  }

  const signal = ImpulseIndicator.decision({
    candles: toCandles(probe.candles),
    ...settings.classifier,
  });
  if (!settings.htfBias) {
    return { symbol: symbol.name, ticker: probe.ticker, signal, finalDirection: signal.direction };
  }

  // tempo gráfico maior no ticker que respondeu; sem dados lá = sem viés
  const htf = await probeTickers([probe.ticker], symbol.htfInterval, symbol.htfRange, probeOptions);
  const htfBias: TDirection = htf.ok
    ? TrendBiasIndicator.decision({ closes: htf.candles.map((c) => c.close) })
    : "Neutral";

  return {
    symbol: symbol.name,
    ticker: probe.ticker,
    signal,
    htfBias,
    finalDirection: combineDirections(signal.direction, htfBias),
  };
}

function symbolOutcome(
  report: SymbolReport,
  deliveries: readonly DeliveryOutcome[],
  dryRun = false,
): SymbolOutcome {
  if (report.error || !report.signal) {
    return { symbol: report.symbol, ok: false, message: report.error ?? "no signal" };
  }
  const failed = deliveries.filter((d) => !d.ok);
  if (failed.length) {
    const detail = failed.map((d) => `${d.channel}: ${d.error ?? "failed"}`).join("; ");
    return { symbol: report.symbol, ok: false, message: `delivery failed (${detail})` };
  }
  const verb = dryRun ? "printed" : "sent";
  return { symbol: report.symbol, ok: true, message: `${verb} (score ${report.signal.score})` };
}

/**
 * Uma varredura: busca e classifica cada símbolo em ordem e depois entrega o
 * relatório. Símbolo com falha entra no relatório e é pulado; falha de envio
 * é logada e não interrompe os outros canais.
 */
export async function runScan(
  config: ScannerConfig,
  symbols: readonly SymbolConfig[],
  deps: ScanDeps,
): Promise<ScanResult> {
  const now = deps.now?.() ?? new Date();
  const print = deps.print ?? ((text: string) => console.log(text));

  const reports: SymbolReport[] = [];
  for (const symbol of symbols) {
    let report: SymbolReport;
    try {
      report = await scanSymbol(symbol, config, deps.fetchKlines);
    } catch (err) {
      report = { symbol: symbol.name, error: `error processing: ${errorMessage(err)}` };
    }
    if (report.error) {
      log.warn("symbol skipped", { symbol: symbol.name, error: report.error });
    } else {
      log.info("classified", {
        symbol: report.symbol,
        ticker: report.ticker,
        direction: report.finalDirection,
        wave: report.signal?.wave,
        score: report.signal?.score,
      });
    }
    reports.push(report);
  }

  const send = async (message: NotificationMessage): Promise<DeliveryOutcome[]> => {
    if (config.dryRun) {
      print(message.text);
      return [];
    }
    return dispatch(deps.notifiers, message);
  };

  const messages: NotificationMessage[] = [];
  const deliveries: DeliveryOutcome[] = [];

  if (config.reportMode === "combined") {
    const message = { title: `${formatUtc(now)} UTC`, text: formatReport(reports, now) };
    messages.push(message);
    deliveries.push(...(await send(message)));
  } else {
    const outcomes: SymbolOutcome[] = [];
    for (const report of reports) {
      if (report.error || !report.signal) {
        outcomes.push(symbolOutcome(report, []));
        continue;
      }
      const message = { title: report.symbol, text: formatSymbolMessage(report, now) };
      messages.push(message);
      const sent = await send(message);
      deliveries.push(...sent);
      outcomes.push(symbolOutcome(report, sent, config.dryRun));
    }
    const summary = { title: "run summary", text: formatRunSummary(outcomes) };
    messages.push(summary);
    deliveries.push(...(await send(summary)));
  }

  return { reports, messages, deliveries };
}

/** 0 quando algo foi entregue (ou impresso), 1 quando todos os envios falharam. */
export function exitCodeFor(result: ScanResult, dryRun: boolean): number {
  if (dryRun) return 0;
  return result.deliveries.some((d) => d.ok) ? 0 : 1;
}
