import { ANALYSIS } from '../../config/analysisConfig';
import { linearRegression, predict } from '../utils/statistics';
import type { Metric, Outcome, TrendProjection, ProjectedMetric } from '../../types';

export interface SeriesPoint {
  year: number;
  value: Metric;
}

/**
 * Straight-line projection of one metric.
 * Fits OLS on the non-missing (year, value) pairs and evaluates the line at
 * latestYear + 1 ... latestYear + years.
 */
export function projectLinearTrend(
  metric: ProjectedMetric,
  series: readonly SeriesPoint[],
  latestYear: number,
  years: number = ANALYSIS.PROJECTION.DEFAULT_YEARS
): Outcome<TrendProjection> {
  const observed = series.filter(
    (p): p is { year: number; value: number } => p.value != null && Number.isFinite(p.value)
  );

  if (observed.length < ANALYSIS.PROJECTION.MIN_POINTS) {
    return { status: 'insufficient-data', observations: observed.length, required: ANALYSIS.PROJECTION.MIN_POINTS };
  }

  const fit = linearRegression(observed.map(p => p.year), observed.map(p => p.value));
  if (!fit) {
    return { status: 'undefined', reason: `all ${metric} observations share the same year` };
  }

  const points = Array.from({ length: years }, (_, i) => {
    const year = latestYear + i + 1;
    return { year, value: predict(fit, year) };
  });

  return {
    status: 'ok',
    value: {
      metric,
      slope: fit.slope,
      intercept: fit.intercept,
      direction: fit.slope > 0 ? 'up' : 'down',
      points,
    },
  };
}
