/**
 * Analysis Engine
 *
 * Turns one bank's enriched yearly records into the figures and narrative
 * shown in the report: latest ratios, historical ROE comparison, qualitative
 * labels, strengths/weaknesses, recommendations and linear projections.
 *
 * Comparisons against an absent value never count as a strength and never
 * trigger a recommendation; the label for that comparison is 'insufficient-data'.
 */

import { ANALYSIS } from '../../config/analysisConfig';
import { DatasetError } from '../dataset/datasetError';
import { groupByEntity } from '../pipeline/growthCalculator';
import { formatNumber, formatPercent } from '../utils/format';
import { mean, presentValues, sampleStdDev } from '../utils/statistics';
import { projectLinearTrend } from './trendProjection';
import type {
  AnalysisSummary,
  BankAnalysis,
  DatasetAnalysis,
  FinancialRecord,
  Metric,
  Outcome,
  ProjectedMetric,
  TrendProjection,
} from '../../types';

export interface AnalysisOptions {
  latestYear?: number;
  projectionYears?: number;
}

export const PROJECTED_METRICS: readonly ProjectedMetric[] = ['roe', 'roa', 'profitMargin', 'leverageRatio'];

export const RECOMMENDATIONS = {
  MARGIN: 'Improve operating efficiency to lift profit margins',
  LEVERAGE: 'Strengthen equity capital to reduce financial risk',
  TREND: 'Investigate the drivers behind declining profitability',
  MAINTAIN: 'Maintain the current trajectory',
} as const;

// ============ HELPERS ============

const insufficient = <T>(observations: number, required: number): Outcome<T> => ({
  status: 'insufficient-data',
  observations,
  required,
});

export function calculateRoeChange(series: readonly FinancialRecord[]): Outcome<number> {
  if (series.length < ANALYSIS.HISTORY.MIN_YEARS) {
    return insufficient(series.length, ANALYSIS.HISTORY.MIN_YEARS);
  }
  const first = series[0];
  const last = series[series.length - 1];
  if (first.roe == null || first.roe === 0) {
    return { status: 'undefined', reason: `ROE for ${first.year} is ${first.roe == null ? 'unavailable' : 'zero'}` };
  }
  if (last.roe == null) {
    return { status: 'undefined', reason: `ROE for ${last.year} is unavailable` };
  }
  return { status: 'ok', value: (last.roe / first.roe - 1) * 100 };
}

export function calculateRoeVolatility(series: readonly FinancialRecord[]): Outcome<number> {
  const values = presentValues(series.map(r => r.roe));
  const std = sampleStdDev(values);
  if (std === null) return insufficient(values.length, ANALYSIS.HISTORY.MIN_YEARS);
  return { status: 'ok', value: std };
}

export function summarize(params: {
  latestRoe: Metric;
  avgRoe: Metric;
  latestMargin: Metric;
  roeChange: Outcome<number>;
  roeVolatility: Outcome<number>;
}): AnalysisSummary {
  const { latestRoe, avgRoe, latestMargin, roeChange, roeVolatility } = params;
  const { LABELS } = ANALYSIS;

  return {
    roePerformance: latestRoe == null || avgRoe == null
      ? 'insufficient-data'
      : latestRoe > avgRoe ? 'high' : 'moderate',
    stability: roeVolatility.status !== 'ok'
      ? 'insufficient-data'
      : roeVolatility.value < LABELS.STABLE_ROE_STD ? 'stable' : 'variable',
    // A change of exactly 0 is not growth
    growthTrend: roeChange.status !== 'ok'
      ? 'insufficient-data'
      : roeChange.value > 0 ? 'growth' : 'decline',
    profitability: latestMargin == null
      ? 'insufficient-data'
      : latestMargin > LABELS.MARGIN_STRONG ? 'strong'
        : latestMargin > LABELS.MARGIN_MODERATE ? 'moderate' : 'weak',
  };
}

/**
 * Four independent checks, each yielding exactly one strength or one weakness.
 */
export function assessStrengths(params: {
  latestYear: number;
  latestRoe: Metric;
  avgRoe: Metric;
  latestMargin: Metric;
  latestLeverage: Metric;
  roeChange: Outcome<number>;
}): { strengths: string[]; weaknesses: string[] } {
  const { latestYear, latestRoe, avgRoe, latestMargin, latestLeverage, roeChange } = params;
  const { DIAGNOSTICS } = ANALYSIS;
  const strengths: string[] = [];
  const weaknesses: string[] = [];

  // 1. Latest ROE vs history
  if (latestRoe == null || avgRoe == null) {
    weaknesses.push(`ROE for ${latestYear} unavailable, no comparison with the historical average`);
  } else if (latestRoe > avgRoe) {
    strengths.push(`ROE above its historical average (${formatNumber(latestRoe, 3)} vs ${formatNumber(avgRoe, 3)})`);
  } else {
    weaknesses.push('ROE below its historical average');
  }

  // 2. ROE trend over the period
  if (roeChange.status === 'ok' && roeChange.value > 0) {
    strengths.push(`ROE improved by ${Math.abs(roeChange.value).toFixed(1)}% over the period`);
  } else if (roeChange.status === 'ok') {
    weaknesses.push(`ROE declined by ${Math.abs(roeChange.value).toFixed(1)}% over the period`);
  } else if (roeChange.status === 'insufficient-data') {
    weaknesses.push(`ROE trend unavailable (insufficient data: ${roeChange.observations} of ${roeChange.required} years)`);
  } else {
    weaknesses.push(`ROE trend unavailable (${roeChange.reason})`);
  }

  // 3. Margin
  if (latestMargin == null) {
    weaknesses.push(`Profit margin for ${latestYear} unavailable`);
  } else if (latestMargin > DIAGNOSTICS.MARGIN_SOLID) {
    strengths.push(`Solid profit margin of ${formatPercent(latestMargin)}`);
  } else {
    weaknesses.push(`Profit margin to optimise (${formatPercent(latestMargin)})`);
  }

  // 4. Leverage
  if (latestLeverage == null) {
    weaknesses.push(`Leverage for ${latestYear} unavailable`);
  } else if (latestLeverage < DIAGNOSTICS.LEVERAGE_ROBUST) {
    strengths.push(`Robust financial structure (leverage of ${formatNumber(latestLeverage)})`);
  } else {
    weaknesses.push(`High level of debt (leverage of ${formatNumber(latestLeverage)})`);
  }

  return { strengths, weaknesses };
}

export function recommend(params: {
  latestMargin: Metric;
  latestLeverage: Metric;
  roeChange: Outcome<number>;
}): string[] {
  const { latestMargin, latestLeverage, roeChange } = params;
  const { DIAGNOSTICS } = ANALYSIS;
  const recommendations: string[] = [];

  if (latestMargin != null && latestMargin < DIAGNOSTICS.MARGIN_SOLID) {
    recommendations.push(RECOMMENDATIONS.MARGIN);
  }
  if (latestLeverage != null && latestLeverage > DIAGNOSTICS.LEVERAGE_ROBUST) {
    recommendations.push(RECOMMENDATIONS.LEVERAGE);
  }
  if (roeChange.status === 'ok' && roeChange.value < 0) {
    recommendations.push(RECOMMENDATIONS.TREND);
  }
  if (recommendations.length === 0) {
    recommendations.push(RECOMMENDATIONS.MAINTAIN);
  }
  return recommendations;
}

// ============ ENTRY POINTS ============

export function analyzeEntity(records: readonly FinancialRecord[], options: AnalysisOptions = {}): BankAnalysis {
  if (records.length === 0) {
    throw new DatasetError('EMPTY_DATASET', 'Cannot analyse a bank without records');
  }
  const entityName = records[0].entityName;
  const foreign = records.find(r => r.entityName !== entityName);
  if (foreign) {
    throw new Error(`analyzeEntity expects one bank, got "${entityName}" and "${foreign.entityName}"`);
  }

  const series = [...records].sort((a, b) => a.year - b.year);
  const latestYear = options.latestYear ?? series[series.length - 1].year;
  const projectionYears = options.projectionYears ?? ANALYSIS.PROJECTION.DEFAULT_YEARS;
  const latest = series.find(r => r.year === latestYear);

  if (!latest) {
    console.warn(`[Analysis] ${entityName} has no record for ${latestYear}; latest metrics unavailable`);
  }

  const latestRoe = latest?.roe ?? null;
  const latestRoa = latest?.roa ?? null;
  const latestMargin = latest?.profitMargin ?? null;
  const latestLeverage = latest?.leverageRatio ?? null;
  const avgRoe = mean(presentValues(series.map(r => r.roe)));
  const roeChange = calculateRoeChange(series);
  const roeVolatility = calculateRoeVolatility(series);

  // Independent fit per metric
  const project = (metric: ProjectedMetric) =>
    projectLinearTrend(metric, series.map(r => ({ year: r.year, value: r[metric] })), latestYear, projectionYears);
  const projections: Record<ProjectedMetric, Outcome<TrendProjection>> = {
    roe: project('roe'),
    roa: project('roa'),
    profitMargin: project('profitMargin'),
    leverageRatio: project('leverageRatio'),
  };

  return {
    entityName,
    latestYear,
    yearsAvailable: series.map(r => r.year),
    latestRoe,
    latestRoa,
    latestMargin,
    latestLeverage,
    avgRoe,
    roeChange,
    roeVolatility,
    summary: summarize({ latestRoe, avgRoe, latestMargin, roeChange, roeVolatility }),
    ...assessStrengths({ latestYear, latestRoe, avgRoe, latestMargin, latestLeverage, roeChange }),
    recommendations: recommend({ latestMargin, latestLeverage, roeChange }),
    projections,
  };
}

/**
 * Analyses every bank in the dataset against the dataset-wide latest year.
 */
export function analyzeDataset(
  records: readonly FinancialRecord[],
  options: Pick<AnalysisOptions, 'projectionYears'> = {}
): DatasetAnalysis {
  if (records.length === 0) {
    throw new DatasetError('EMPTY_DATASET', 'Dataset contains no records');
  }
  const years = records.map(r => r.year);
  const firstYear = Math.min(...years);
  const latestYear = Math.max(...years);

  const groups = groupByEntity(records);
  const banks = [...groups.keys()]
    .sort((a, b) => a.localeCompare(b))
    .map(name => analyzeEntity(groups.get(name) ?? [], { latestYear, projectionYears: options.projectionYears }));

  return { firstYear, latestYear, banks };
}
