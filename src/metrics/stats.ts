export type PriceStats = {
  min: number;
  max: number;
  mean: number;
  stdDev: number;
  size: number;
};

export const sum = (values: readonly number[]) => values.reduce((acc, value) => acc + value, 0);

export const mean = (values: readonly number[]) =>
  values.length === 0 ? Number.NaN : sum(values) / values.length;

/** Population standard deviation; 0 for fewer than two values. */
export const populationStdDev = (values: readonly number[]) => {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((acc, value) => acc + Math.pow(value - avg, 2), 0) / values.length;
  return Math.sqrt(variance);
};

export const describePrices = (values: readonly number[]): PriceStats | null => {
  if (values.length === 0) return null;
  return {
    min: Math.min(...values),
    max: Math.max(...values),
    mean: mean(values),
    stdDev: populationStdDev(values),
    size: values.length,
  };
};
