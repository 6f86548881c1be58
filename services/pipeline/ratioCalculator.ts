import { safeDivide } from '../utils/statistics';
import type { RatioFields, RawFinancialRecord } from '../../types';

const percent = (value: number | null): number | null => (value === null ? null : value * 100);

export function calculateRatios(record: RawFinancialRecord): RatioFields {
  return {
    leverageRatio: safeDivide(record.totalLiabilities, record.stockholdersEquity),
    roe: safeDivide(record.netIncome, record.stockholdersEquity),
    roa: safeDivide(record.netIncome, record.totalAssets),
    profitMargin: percent(safeDivide(record.netIncome, record.totalRevenue)),
    equityRatio: percent(safeDivide(record.stockholdersEquity, record.totalAssets)),
  };
}

/** Returns new records with the ratio fields populated; inputs are not touched. */
export function computeRatios<T extends RawFinancialRecord>(records: readonly T[]): Array<T & RatioFields> {
  return records.map(record => ({ ...record, ...calculateRatios(record) }));
}
