/**
 * Pure data shaping for the report charts and tables.
 * Absent values stay `null` so charts draw a gap instead of a zero.
 */

import { groupByEntity } from '../pipeline/growthCalculator';
import { median, presentValues, sampleStdDev } from '../utils/statistics';
import type { FinancialRecord, Metric } from '../../types';

export type RecordMetric =
  | 'roe'
  | 'roa'
  | 'profitMargin'
  | 'leverageRatio'
  | 'equityRatio'
  | 'revenueGrowth'
  | 'netIncomeGrowth'
  | 'assetsGrowth'
  | 'totalAssets'
  | 'stockholdersEquity';

export interface YearRow {
  year: number;
  values: Record<string, Metric>;
}

export function bankNames(records: readonly FinancialRecord[]): string[] {
  return [...new Set(records.map(r => r.entityName))].sort((a, b) => a.localeCompare(b));
}

/** One row per year with each bank's value for `metric` (null when absent). */
export function pivotByYear(
  records: readonly FinancialRecord[],
  metric: RecordMetric,
  scale = 1
): YearRow[] {
  const banks = bankNames(records);
  const years = [...new Set(records.map(r => r.year))].sort((a, b) => a - b);
  return years.map(year => {
    const values: Record<string, Metric> = {};
    for (const bank of banks) {
      const value = records.find(r => r.entityName === bank && r.year === year)?.[metric] ?? null;
      values[bank] = value === null ? null : value / scale;
    }
    return { year, values };
  });
}

export interface RadarRow {
  axis: string;
  values: Record<string, Metric>;
}

const RADAR_AXES: Array<{ axis: string; metric: RecordMetric; invert: boolean }> = [
  { axis: 'ROE', metric: 'roe', invert: false },
  { axis: 'ROA', metric: 'roa', invert: false },
  { axis: 'Profit margin', metric: 'profitMargin', invert: false },
  { axis: 'Equity ratio', metric: 'equityRatio', invert: false },
  { axis: 'Solidity (1/leverage)', metric: 'leverageRatio', invert: true },
];

/**
 * Min-max normalisation of the latest-year metrics across banks.
 * When every bank has the same value the axis is 1 for all of them.
 */
export function radarData(records: readonly FinancialRecord[], latestYear: number): RadarRow[] {
  const latest = records.filter(r => r.year === latestYear);
  return RADAR_AXES.map(({ axis, metric, invert }) => {
    const present = presentValues(latest.map(r => r[metric]));
    const min = present.length ? Math.min(...present) : 0;
    const max = present.length ? Math.max(...present) : 0;
    const values: Record<string, Metric> = {};
    for (const record of latest) {
      const value = record[metric];
      if (value === null) {
        values[record.entityName] = null;
        continue;
      }
      const normalized = max === min ? 1 : (value - min) / (max - min);
      values[record.entityName] = invert && max !== min ? 1 - normalized : normalized;
    }
    return { axis, values };
  });
}

export interface ScatterPoint {
  leverage: number;
  roe: number;
  year: number;
}

export function riskReturnPoints(records: readonly FinancialRecord[]): Map<string, ScatterPoint[]> {
  const points = new Map<string, ScatterPoint[]>();
  for (const [bank, series] of groupByEntity(records)) {
    points.set(
      bank,
      series.flatMap(r => (r.leverageRatio === null || r.roe === null ? [] : [{ leverage: r.leverageRatio, roe: r.roe, year: r.year }]))
    );
  }
  return points;
}

export function datasetMedian(records: readonly FinancialRecord[], metric: RecordMetric): Metric {
  return median(presentValues(records.map(r => r[metric])));
}

export interface DistributionRow {
  bank: string;
  min: Metric;
  median: Metric;
  max: Metric;
  std: Metric;
}

export function distribution(records: readonly FinancialRecord[], metric: RecordMetric): DistributionRow[] {
  return [...groupByEntity(records)]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([bank, series]) => {
      const values = presentValues(series.map(r => r[metric]));
      return {
        bank,
        min: values.length ? Math.min(...values) : null,
        median: median(values),
        max: values.length ? Math.max(...values) : null,
        std: sampleStdDev(values),
      };
    });
}
