import type { Metric } from '../../types';

/**
 * Division that yields `null` instead of Infinity/NaN.
 * A zero or absent denominator (or an absent numerator) has no ratio.
 */
export function safeDivide(numerator: Metric, denominator: Metric): Metric {
  if (numerator == null || denominator == null) return null;
  if (denominator === 0 || !Number.isFinite(numerator) || !Number.isFinite(denominator)) return null;
  return numerator / denominator;
}

export function presentValues(values: readonly Metric[]): number[] {
  return values.filter((v): v is number => v != null && Number.isFinite(v));
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1 denominator). Needs at least 2 values. */
export function sampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const avg = values.reduce((sum, v) => sum + v, 0) / values.length;
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export interface LinearFit {
  slope: number;
  intercept: number;
  meanX: number;
  meanY: number;
}

/**
 * Ordinary least squares fit of y = slope * x + intercept.
 * Evaluate through `predict`, which works around the centre (meanX, meanY)
 * so calendar years do not lose precision.
 * Returns null with fewer than 2 points or when every x is equal.
 */
export function linearRegression(x: readonly number[], y: readonly number[]): LinearFit | null {
  const n = Math.min(x.length, y.length);
  if (n < 2) return null;

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += x[i];
    sumY += y[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX;
    sxy += dx * (y[i] - meanY);
    sxx += dx * dx;
  }
  if (sxx === 0) return null;

  const slope = sxy / sxx;
  return { slope, intercept: meanY - slope * meanX, meanX, meanY };
}

export const predict = (fit: LinearFit, x: number): number => fit.meanY + fit.slope * (x - fit.meanX);
