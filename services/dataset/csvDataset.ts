/**
 * Flat CSV persistence of the enriched dataset.
 *
 * Layout: first column is the row index (report date), then one column per
 * field in snake_case. Absent values are empty cells.
 */

import { promises as fs } from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { z } from 'zod';
import { DatasetError } from './datasetError';
import { computeRatios } from '../pipeline/ratioCalculator';
import { computeGrowthRates } from '../pipeline/growthCalculator';
import { yearOfDate } from '../pipeline/statementLoader';
import { RAW_FIELDS } from '../../types';
import type { DroppedRow, FinancialRecord, Metric, RawField, RawFinancialRecord } from '../../types';

export const INDEX_COLUMN = 'period_end';

export const RAW_COLUMNS: Record<RawField, string> = {
  totalRevenue: 'total_revenue',
  netIncome: 'net_income',
  totalAssets: 'total_assets',
  totalLiabilities: 'total_liabilities',
  stockholdersEquity: 'stockholders_equity',
};

export const OUTPUT_COLUMNS = [
  INDEX_COLUMN,
  'entity_name',
  'year',
  'total_revenue',
  'net_income',
  'total_assets',
  'total_liabilities',
  'stockholders_equity',
  'roe',
  'roa',
  'profit_margin',
  'leverage_ratio',
  'equity_ratio',
  'revenue_growth',
  'net_income_growth',
  'assets_growth',
  'growth_base_year',
] as const;

const REQUIRED_COLUMNS = ['entity_name', ...Object.values(RAW_COLUMNS)];

const numericCell = z
  .string()
  .optional()
  .transform((raw, ctx): Metric => {
    const text = raw?.trim() ?? '';
    if (text === '' || text.toLowerCase() === 'nan') return null;
    const value = Number(text);
    if (!Number.isFinite(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${text}" is not a number` });
      return z.NEVER;
    }
    return value;
  });

const CsvRowSchema = z.object({
  entity_name: z.string().trim().min(1, 'entity_name is empty'),
  year: numericCell,
  total_revenue: numericCell,
  net_income: numericCell,
  total_assets: numericCell,
  total_liabilities: numericCell,
  stockholders_equity: numericCell,
});

export interface ParsedDataset {
  records: RawFinancialRecord[];
  dropped: DroppedRow[];
}

/**
 * Parses the raw inputs of a dataset. Derived columns present in the file are
 * ignored; the pipeline recomputes them.
 */
export function parseDatasetCsv(text: string): ParsedDataset {
  const parsed = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: 'greedy',
  });

  for (const error of parsed.errors) {
    console.warn(`[Dataset] CSV ${error.code} at row ${error.row ?? '?'}: ${error.message}`);
  }

  const fields = parsed.meta.fields ?? [];
  for (const column of REQUIRED_COLUMNS) {
    if (!fields.includes(column)) {
      throw new DatasetError('MISSING_COLUMN', `Missing required column "${column}"`);
    }
  }
  // First column is the index, whatever its header says
  const indexColumn = fields[0];

  const records: RawFinancialRecord[] = [];
  const dropped: DroppedRow[] = [];
  const seen = new Set<string>();

  parsed.data.forEach((row, i) => {
    const rowNumber = i + 2; // header is line 1
    const result = CsvRowSchema.safeParse(row);
    if (!result.success) {
      const detail = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new DatasetError('INVALID_ROW', detail, rowNumber);
    }
    const cells = result.data;
    const periodEnd = indexColumn !== undefined && indexColumn !== 'entity_name' ? row[indexColumn]?.trim() || null : null;

    let year: number | null = cells.year;
    if (year === null && periodEnd) year = yearOfDate(periodEnd);

    // Incomplete rows are dropped before the year is required
    const { total_revenue, net_income, total_assets, total_liabilities, stockholders_equity } = cells;
    if (
      total_revenue === null ||
      net_income === null ||
      total_assets === null ||
      total_liabilities === null ||
      stockholders_equity === null
    ) {
      const values: Record<RawField, Metric> = {
        totalRevenue: total_revenue,
        netIncome: net_income,
        totalAssets: total_assets,
        totalLiabilities: total_liabilities,
        stockholdersEquity: stockholders_equity,
      };
      const missing = RAW_FIELDS.filter(field => values[field] === null);
      dropped.push({ entityName: cells.entity_name, date: periodEnd ?? (year === null ? '' : String(year)), missing });
      return;
    }

    if (year === null || !Number.isInteger(year)) {
      throw new DatasetError('INVALID_ROW', `cannot determine the year for ${cells.entity_name}`, rowNumber);
    }

    const key = `${cells.entity_name}\u0000${year}`;
    if (seen.has(key)) {
      throw new DatasetError('DUPLICATE_PERIOD', `${cells.entity_name} already has a row for ${year}`, rowNumber);
    }
    seen.add(key);

    records.push({
      entityName: cells.entity_name,
      year,
      periodEnd,
      totalRevenue: total_revenue,
      netIncome: net_income,
      totalAssets: total_assets,
      totalLiabilities: total_liabilities,
      stockholdersEquity: stockholders_equity,
    });
  });

  for (const row of dropped) {
    console.warn(`[Dataset] Dropping ${row.entityName} ${row.date || '(no date)'}: missing ${row.missing.join(', ')}`);
  }

  return { records, dropped };
}

/** Runs the ratio and growth stages over parsed raw inputs. */
export function enrich(records: readonly RawFinancialRecord[]): FinancialRecord[] {
  return computeGrowthRates(computeRatios(records));
}

const cell = (value: Metric | string): string => {
  if (value === null) return '';
  return typeof value === 'number' ? String(value) : value;
};

export function serializeDatasetCsv(records: readonly FinancialRecord[]): string {
  const data = records.map(r => [
    cell(r.periodEnd),
    r.entityName,
    String(r.year),
    cell(r.totalRevenue),
    cell(r.netIncome),
    cell(r.totalAssets),
    cell(r.totalLiabilities),
    cell(r.stockholdersEquity),
    cell(r.roe),
    cell(r.roa),
    cell(r.profitMargin),
    cell(r.leverageRatio),
    cell(r.equityRatio),
    cell(r.revenueGrowth),
    cell(r.netIncomeGrowth),
    cell(r.assetsGrowth),
    cell(r.growthBaseYear),
  ]);
  return Papa.unparse({ fields: [...OUTPUT_COLUMNS], data }, { newline: '\n' }) + '\n';
}

export async function readDataset(filePath: string): Promise<FinancialRecord[]> {
  const text = await fs.readFile(filePath, 'utf-8');
  const { records } = parseDatasetCsv(text);
  if (records.length === 0) {
    throw new DatasetError('EMPTY_DATASET', `No complete rows in ${filePath}`);
  }
  return enrich(records);
}

export async function writeDataset(filePath: string, records: readonly FinancialRecord[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeDatasetCsv(records), 'utf-8');
}
