export const clamp = (value: number, min = 0, max = 1): number => Math.min(max, Math.max(min, value));

export const round = (value: number, digits = 4): number => {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
};

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/** Sample standard deviation (n - 1). */
export function stdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const squares = values.reduce((acc, v) => acc + (v - m) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}
