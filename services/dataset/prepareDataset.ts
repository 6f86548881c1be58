/**
 * Builds the enriched dataset from a statement provider:
 * fetch -> load -> ratios -> growth -> CSV.
 */

import { DatasetError } from './datasetError';
import { enrich, writeDataset } from './csvDataset';
import { loadEntityStatements } from '../pipeline/statementLoader';
import type { StatementProvider } from '../api/provider';
import type { BankProfile, DroppedRow, FinancialRecord, RawFinancialRecord } from '../../types';

export interface BankFailure {
  bank: string;
  ticker: string;
  error: string;
}

export interface PreparedDataset {
  records: FinancialRecord[];
  dropped: DroppedRow[];
  failures: BankFailure[];
}

export async function collectDataset(
  provider: StatementProvider,
  banks: readonly BankProfile[]
): Promise<PreparedDataset> {
  const raw: RawFinancialRecord[] = [];
  const dropped: DroppedRow[] = [];
  const failures: BankFailure[] = [];

  // One bank at a time; providers rate-limit per key
  for (const bank of banks) {
    console.log(`[Dataset] Loading ${bank.name} (${bank.ticker})...`);
    try {
      const statements = await provider.getStatements(bank.ticker);
      const loaded = loadEntityStatements(bank.name, statements.income, statements.balance);
      for (const row of loaded.dropped) {
        console.warn(`[Loader] Dropping ${row.entityName} ${row.date}: missing ${row.missing.join(', ') || 'report year'}`);
      }
      raw.push(...loaded.records);
      dropped.push(...loaded.dropped);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Dataset] Failed to load ${bank.name}: ${message}`);
      failures.push({ bank: bank.name, ticker: bank.ticker, error: message });
    }
  }

  if (raw.length === 0) {
    throw new DatasetError('EMPTY_DATASET', `No complete statements for ${banks.map(b => b.ticker).join(', ') || 'any bank'}`);
  }

  return { records: enrich(raw), dropped, failures };
}

export async function prepareDataset(
  provider: StatementProvider,
  banks: readonly BankProfile[],
  outputPath: string
): Promise<PreparedDataset> {
  const prepared = await collectDataset(provider, banks);
  await writeDataset(outputPath, prepared.records);
  console.log(`[Dataset] Saved ${prepared.records.length} rows to ${outputPath}`);
  return prepared;
}
