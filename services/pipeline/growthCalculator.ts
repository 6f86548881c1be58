/**
 * Year-over-year growth per bank.
 *
 * "Previous" is the previous record of the same bank in year order, which is
 * not necessarily year - 1. `growthBaseYear` keeps track of the year used.
 */

import { DatasetError } from '../dataset/datasetError';
import { safeDivide } from '../utils/statistics';
import type { FinancialRecord, GrowthFields, Metric, RatioRecord } from '../../types';

const pctChange = (current: number, previous: number): Metric => {
  const ratio = safeDivide(current - previous, previous);
  return ratio === null ? null : ratio * 100;
};

export const NO_GROWTH: GrowthFields = {
  revenueGrowth: null,
  netIncomeGrowth: null,
  assetsGrowth: null,
  growthBaseYear: null,
};

export function groupByEntity<T extends { entityName: string; year: number }>(
  records: readonly T[]
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const record of records) {
    const group = groups.get(record.entityName);
    if (group) group.push(record);
    else groups.set(record.entityName, [record]);
  }
  for (const group of groups.values()) group.sort((a, b) => a.year - b.year);
  return groups;
}

export function computeGrowthRates(records: readonly RatioRecord[]): FinancialRecord[] {
  const groups = groupByEntity(records);
  const entities = [...groups.keys()].sort((a, b) => a.localeCompare(b));
  const result: FinancialRecord[] = [];

  for (const entity of entities) {
    const series = groups.get(entity) ?? [];
    series.forEach((record, i) => {
      const previous = i > 0 ? series[i - 1] : undefined;
      if (!previous) {
        result.push({ ...record, ...NO_GROWTH });
        return;
      }
      if (previous.year === record.year) {
        throw new DatasetError('DUPLICATE_PERIOD', `Duplicate period ${record.year} for ${entity}`);
      }
      result.push({
        ...record,
        revenueGrowth: pctChange(record.totalRevenue, previous.totalRevenue),
        netIncomeGrowth: pctChange(record.netIncome, previous.netIncome),
        assetsGrowth: pctChange(record.totalAssets, previous.totalAssets),
        growthBaseYear: previous.year,
      });
    });
  }

  return result;
}
