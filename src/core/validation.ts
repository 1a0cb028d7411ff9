export const clamp = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};

export const roundTo = (value: number, decimals = 2): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export const last = <T>(values: readonly T[]): T | undefined => values[values.length - 1];

export const mean = (values: readonly number[]): number => {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
};

/** Sample variance (n - 1 denominator); 0 for fewer than two values. */
export const sampleVariance = (values: readonly number[]): number => {
  if (values.length < 2) return 0;
  const m = mean(values);
  return values.reduce((s, v) => s + (v - m) ** 2, 0) / (values.length - 1);
};
