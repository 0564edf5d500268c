export type TDirection = "Buy" | "Sell" | "Neutral";
export type TWave = "Impulse" | "Correction";

export type Candle = {
  timestamp: number; // epoch ms, abertura da barra
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type Candles = {
  opens: number[];
  highs: number[];
  lows: number[];
  closes: number[];
  volumes: number[];
  times: number[];
};

export interface ISignalMetrics {
  movePct: number; // variação % do fechamento na janela
  slopePct: number | null; // slope da EMA por barra, % da última EMA (null: poucas barras)
  monotonic: boolean;
  breakout: boolean;
  risingVolume: boolean;
  lastClose: number | null;
}

export interface ISignalResult {
  ok: boolean; // false = dados insuficientes
  direction: TDirection;
  wave: TWave;
  reason: string;
  score: number; // 0..5
  metrics: ISignalMetrics;
}

export function toCandles(rows: readonly Candle[]): Candles {
  return {
    opens: rows.map((c) => c.open),
    highs: rows.map((c) => c.high),
    lows: rows.map((c) => c.low),
    closes: rows.map((c) => c.close),
    volumes: rows.map((c) => c.volume),
    times: rows.map((c) => c.timestamp),
  };
}
