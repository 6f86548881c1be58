/**
 * Statement Loader
 *
 * Joins one bank's income-statement and balance-sheet rows on report date and
 * keeps the five raw inputs the ratio stage needs. Rows with any missing input
 * are dropped and reported back to the caller.
 */

import { RAW_FIELDS } from '../../types';
import type {
  BalanceSheetRow,
  DroppedRow,
  IncomeStatementRow,
  Metric,
  RawField,
  RawFinancialRecord,
} from '../../types';

export interface LoadResult {
  records: RawFinancialRecord[];
  dropped: DroppedRow[];
}

/**
 * Calendar year of a report date, or null when the date does not parse.
 * Non-ISO dates are parsed in local time, so the year is read in local time too.
 */
export function yearOfDate(date: string): number | null {
  const match = /^(\d{4})-\d{2}-\d{2}/.exec(date.trim());
  if (match) return Number(match[1]);
  const parsed = new Date(date);
  return Number.isNaN(parsed.getTime()) ? null : parsed.getFullYear();
}

const isPresent = (value: Metric | undefined): value is number =>
  value != null && Number.isFinite(value);

export function loadEntityStatements(
  entityName: string,
  incomeRows: readonly IncomeStatementRow[],
  balanceRows: readonly BalanceSheetRow[]
): LoadResult {
  const balanceByDate = new Map<string, BalanceSheetRow>();
  for (const row of balanceRows) balanceByDate.set(row.date, row);

  const dates = new Set<string>([...incomeRows.map(r => r.date), ...balanceByDate.keys()]);
  const incomeByDate = new Map<string, IncomeStatementRow>();
  for (const row of incomeRows) incomeByDate.set(row.date, row);

  // Latest report date wins when two reports fall in the same calendar year
  const byYear = new Map<number, RawFinancialRecord>();
  const dropped: DroppedRow[] = [];

  for (const date of [...dates].sort()) {
    const income = incomeByDate.get(date);
    const balance = balanceByDate.get(date);
    const values: Record<RawField, Metric | undefined> = {
      totalRevenue: income?.totalRevenue,
      netIncome: income?.netIncome,
      totalAssets: balance?.totalAssets,
      totalLiabilities: balance?.totalLiabilities,
      stockholdersEquity: balance?.stockholdersEquity,
    };

    const missing = RAW_FIELDS.filter(field => !isPresent(values[field]));
    const year = yearOfDate(date);
    if (year === null) {
      dropped.push({ entityName, date, missing });
      continue;
    }

    const { totalRevenue, netIncome, totalAssets, totalLiabilities, stockholdersEquity } = values;
    if (
      !isPresent(totalRevenue) ||
      !isPresent(netIncome) ||
      !isPresent(totalAssets) ||
      !isPresent(totalLiabilities) ||
      !isPresent(stockholdersEquity)
    ) {
      dropped.push({ entityName, date, missing });
      continue;
    }

    const previous = byYear.get(year);
    if (previous) {
      console.warn(`[Loader] ${entityName}: report ${date} replaces ${previous.periodEnd} for ${year}`);
    }
    byYear.set(year, {
      entityName,
      year,
      periodEnd: date,
      totalRevenue,
      netIncome,
      totalAssets,
      totalLiabilities,
      stockholdersEquity,
    });
  }

  const records = [...byYear.values()].sort((a, b) => a.year - b.year);
  return { records, dropped };
}
