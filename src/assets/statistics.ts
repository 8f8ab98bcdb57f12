export interface SeriesSummary {
  count: number;
  mean: number;
  min: number;
  max: number;
  /** Sample standard deviation; 0 when fewer than two points. */
  stdDev: number;
}

export function summarizeSeries(values: number[]): SeriesSummary | null {
  const finite = values.filter((value) => Number.isFinite(value));
  if (finite.length === 0) {
    return null;
  }

  const count = finite.length;
  const mean = finite.reduce((sum, value) => sum + value, 0) / count;
  const min = Math.min(...finite);
  const max = Math.max(...finite);
  const variance =
    count > 1 ? finite.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (count - 1) : 0;

  return { count, mean, min, max, stdDev: Math.sqrt(variance) };
}
