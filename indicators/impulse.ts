import * as TI from "technicalindicators";
import { padLeft } from "../utils/pad-left";
import type { Candles, ISignalResult, TDirection } from "./types";

export type ImpulseParams = {
  candles: Candles;
  minCandles?: number; // tamanho mínimo da série (default 3)
  window?: number; // barras usadas para medir o movimento (default 3)
  thresholdPct?: number; // |movimento| mínimo para ter direção, em % (default 0.5)
  emaPeriod?: number; // EMA do slope informativo (default 9)
};

export const INSUFFICIENT_DATA = "insufficient data";

function signedPct(v: number): string {
  return `${v > 0 ? "+" : ""}${v.toFixed(2)}%`;
}

export class ImpulseIndicator {
  static calculate({
    candles,
    minCandles = 3,
    window = 3,
    thresholdPct = 0.5,
    emaPeriod = 9,
  }: ImpulseParams) {
    const { closes, highs, lows, volumes } = candles;
    const len = Math.min(closes.length, highs.length, lows.length, volumes.length);
    const win = Math.max(2, window);
    if (!len || len < Math.max(minCandles, win)) {
      return { ok: false as const, reason: INSUFFICIENT_DATA };
    }

    const start = len - win;
    const wCloses = closes.slice(start, len);
    const firstClose = wCloses[0];
    const lastClose = wCloses[wCloses.length - 1];

    // -------- movimento na janela (preço base zero/inválido não divide)
    const movePct =
      firstClose !== 0 && Number.isFinite(firstClose) && Number.isFinite(lastClose)
        ? ((lastClose - firstClose) / firstClose) * 100
        : 0;
    const up = movePct > 0;
    const down = movePct < 0;

    // -------- consistência: fechamentos monotônicos ou rompimento das barras anteriores
    let risingCloses = true;
    let fallingCloses = true;
    for (let i = 1; i < wCloses.length; i++) {
      if (!(wCloses[i] > wCloses[i - 1])) risingCloses = false;
      if (!(wCloses[i] < wCloses[i - 1])) fallingCloses = false;
    }
    const monotonic = up ? risingCloses : down ? fallingCloses : false;

    const priorHigh = Math.max(...highs.slice(start, len - 1));
    const priorLow = Math.min(...lows.slice(start, len - 1));
    const breakout = up ? lastClose > priorHigh : down ? lastClose < priorLow : false;

    const wVolumes = volumes.slice(start, len);
    const meanVolume = wVolumes.reduce((a, b) => a + b, 0) / wVolumes.length;
    const risingVolume = wVolumes[wVolumes.length - 1] > meanVolume;

    // -------- slope da EMA (informativo)
    let slopePct: number | null = null;
    if (len >= emaPeriod) {
      const ema = padLeft(
        len,
        TI.EMA.calculate({ period: emaPeriod, values: closes.slice(0, len) }),
      );
      const lastEma = ema[len - 1];
      const refEma = ema[start];
      if (lastEma != null && refEma != null && lastEma !== 0) {
        slopePct = ((lastEma - refEma) / (win - 1) / lastEma) * 100;
      }
    }

    const direction: TDirection =
      up && movePct >= thresholdPct ? "Buy" : down && movePct <= -thresholdPct ? "Sell" : "Neutral";
    const consistent = monotonic || breakout;
    const impulse = direction !== "Neutral" && consistent;

    let score = 0;
    if (direction !== "Neutral") {
      score += 2;
      if (consistent) score += 2;
      if (risingVolume) score += 1;
    }

    return {
      ok: true as const,
      direction,
      wave: impulse ? ("Impulse" as const) : ("Correction" as const),
      score,
      movePct,
      slopePct,
      monotonic,
      breakout,
      risingVolume,
      lastClose,
      meta: { window: win, thresholdPct, emaPeriod, bars: len },
    };
  }

  static decision(params: ImpulseParams): ISignalResult {
    const r = ImpulseIndicator.calculate(params);
    if (!r.ok) {
      return {
        ok: false,
        direction: "Neutral",
        wave: "Correction",
        reason: r.reason,
        score: 0,
        metrics: {
          movePct: 0,
          slopePct: null,
          monotonic: false,
          breakout: false,
          risingVolume: false,
          lastClose: params.candles.closes[params.candles.closes.length - 1] ?? null,
        },
      };
    }

    const reasonParts = [`move ${signedPct(r.movePct)} over ${r.meta.window} bars`];
    if (r.monotonic) reasonParts.push(`monotonic ${r.movePct > 0 ? "up" : "down"}`);
    if (r.breakout) reasonParts.push(`breaks prior ${r.movePct > 0 ? "high" : "low"}`);
    if (r.direction === "Neutral") reasonParts.push(`below threshold ${r.meta.thresholdPct}%`);
    else if (r.risingVolume) reasonParts.push("rising volume");

    return {
      ok: true,
      direction: r.direction,
      wave: r.wave,
      reason: reasonParts.join("; "),
      score: r.score,
      metrics: {
        movePct: r.movePct,
        slopePct: r.slopePct,
        monotonic: r.monotonic,
        breakout: r.breakout,
        risingVolume: r.risingVolume,
        lastClose: r.lastClose,
      },
    };
  }
}
