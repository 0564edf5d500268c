/** Alinha a série do indicador (mais curta pelo aquecimento) com a série de candles. */
export function padLeft<T>(fullLen: number, arr: readonly T[]): Array<T | null> {
  const pad: Array<T | null> = new Array<T | null>(Math.max(0, fullLen - arr.length)).fill(null);
  return [...pad, ...arr];
}
