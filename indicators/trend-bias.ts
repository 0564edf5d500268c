import * as TI from "technicalindicators";
import type { TDirection } from "./types";

export type TrendBiasParams = {
  closes: number[]; // fechamentos do tempo gráfico maior (ex.: 60m)
  period?: number; // período da SMA (default 20)
};

export class TrendBiasIndicator {
  static calculate({ closes, period = 20 }: TrendBiasParams) {
    if (closes.length < period) {
      return { ok: false as const, reason: "Not enough higher-timeframe bars." };
    }
    const sma = TI.SMA.calculate({ period, values: closes });
    const lastSma = sma[sma.length - 1];
    const price = closes[closes.length - 1];
    if (lastSma === undefined || !Number.isFinite(lastSma) || !Number.isFinite(price)) {
      return { ok: false as const, reason: "SMA unavailable." };
    }
    return {
      ok: true as const,
      price,
      sma: lastSma,
      distancePct: lastSma ? ((price - lastSma) / lastSma) * 100 : 0,
    };
  }

  static decision(params: TrendBiasParams): TDirection {
    const r = TrendBiasIndicator.calculate(params);
    if (!r.ok) return "Neutral";
    return r.price > r.sma ? "Buy" : r.price < r.sma ? "Sell" : "Neutral";
  }
}

/**
 * Junta a direção do tempo gráfico curto com o viés do tempo gráfico maior.
 * Lado neutro cede ao outro; em conflito vence o tempo gráfico maior.
 */
export function combineDirections(short: TDirection, bias: TDirection): TDirection {
  if (short === "Neutral") return bias;
  if (bias === "Neutral") return short;
  return bias;
}
