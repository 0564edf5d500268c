import type { ISignalResult, TDirection } from "./indicators/types";
import { formatUtc, sessionLabel } from "./utils/session";

export type SymbolReport = {
  symbol: string; // nome amigável
  ticker?: string; // ticker que respondeu
  signal?: ISignalResult;
  htfBias?: TDirection; // undefined quando o viés do tempo maior está desligado
  finalDirection?: TDirection;
  error?: string;
};

export type SymbolOutcome = { symbol: string; ok: boolean; message: string };

function trimTrailingZeros(input: string): string {
  return input.replace(/\.0+$/, "").replace(/(\.\d*?)0+$/, "$1");
}

export function formatPrice(value: number | null | undefined, digits = 5): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "—";
  return trimTrailingZeros(value.toFixed(digits));
}

export function formatSignedPct(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "n/a";
  return `${value > 0 ? "+" : ""}${value.toFixed(2)}%`;
}

function slopeText(slopePct: number | null): string {
  return slopePct === null ? "n/a" : `${formatSignedPct(slopePct)}/bar`;
}

function biasLine(r: SymbolReport, signal: ISignalResult): string {
  const final = r.finalDirection ?? signal.direction;
  if (r.htfBias === undefined) return `🧭 Bias: ${final}`;
  return `🧭 Bias: ${final} (short ${signal.direction} | HTF ${r.htfBias})`;
}

function symbolLines(r: SymbolReport, withClock?: Date): string[] {
  if (r.error || !r.signal) {
    return [`❌ ${r.symbol}: ${r.error ?? "no signal"}`];
  }
  const s = r.signal;
  const lines = [`📡 ${r.symbol}${r.ticker ? ` (${r.ticker})` : ""}`];
  if (withClock) {
    lines.push(`🕒 UTC ${formatUtc(withClock)}`, `🔎 Session: ${sessionLabel(withClock)}`);
  }
  lines.push(
    `📈 Last: ${formatPrice(s.metrics.lastClose)}`,
    biasLine(r, s),
    `🌊 Wave: ${s.wave} (score ${s.score})`,
    `📐 Move: ${formatSignedPct(s.metrics.movePct)} | EMA slope: ${slopeText(s.metrics.slopePct)}`,
    `💡 Reason: ${s.reason}`,
  );
  return lines;
}

/** Mensagem avulsa de um símbolo (modo per-symbol). */
export function formatSymbolMessage(r: SymbolReport, now: Date): string {
  return symbolLines(r, now).join("\n");
}

/** Um relatório com todos os símbolos da execução. */
export function formatReport(reports: readonly SymbolReport[], now: Date): string {
  const header = `Impulse Scanner report — ${formatUtc(now)} UTC — Session: ${sessionLabel(now)}`;
  const blocks = reports.map((r) => symbolLines(r).join("\n"));
  return [header, ...blocks].join("\n\n");
}

export function formatRunSummary(outcomes: readonly SymbolOutcome[]): string {
  const lines = outcomes.map((o) => `${o.ok ? "✅" : "❌"} ${o.symbol}: ${o.message}`);
  return ["Impulse scanner run complete:", ...lines].join("\n");
}
