import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
    OUTPUT_COLUMNS,
    parseDatasetCsv,
    readDataset,
    serializeDatasetCsv,
    writeDataset,
} from '../../services/dataset/csvDataset';
import { DatasetError } from '../../services/dataset/datasetError';
import { collectDataset, prepareDataset } from '../../services/dataset/prepareDataset';
import type { StatementProvider } from '../../services/api/provider';
import type { BankProfile, StatementBundle } from '../../types';
import { BANK_A, BANK_CSV, enriched } from './fixtures';
import { captureError, captureRejection } from './helpers';

const HEADER = 'period_end,entity_name,year,total_revenue,net_income,total_assets,total_liabilities,stockholders_equity';

describe('CSV dataset', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    it('should parse the raw inputs of every row', () => {
        const { records, dropped } = parseDatasetCsv(BANK_CSV);

        expect(dropped).toEqual([]);
        expect(records).toHaveLength(4);
        expect(records[0]).toEqual({
            entityName: 'BankA',
            year: 2022,
            periodEnd: '2022-12-31',
            totalRevenue: 100,
            netIncome: 10,
            totalAssets: 1000,
            totalLiabilities: 900,
            stockholdersEquity: 100,
        });
    });

    it('should take the year from the index column when the year cell is empty', () => {
        const { records } = parseDatasetCsv(BANK_CSV);
        expect(records[3]).toMatchObject({ entityName: 'BankB', year: 2023, periodEnd: '2023-12-31' });
    });

    it('should ignore a byte order mark', () => {
        const { records } = parseDatasetCsv(`\uFEFF${BANK_CSV}`);
        expect(records).toHaveLength(4);
    });

    it('should drop rows with a missing raw input', () => {
        const { records, dropped } = parseDatasetCsv([
            HEADER,
            '2022-12-31,BankA,2022,100,10,1000,900,100',
            '2023-12-31,BankA,2023,120,,1100,980,nan',
        ].join('\n'));

        expect(records).toHaveLength(1);
        expect(dropped).toEqual([
            { entityName: 'BankA', date: '2023-12-31', missing: ['netIncome', 'stockholdersEquity'] },
        ]);
    });

    it('should drop an incomplete row even when its year cannot be determined', () => {
        const { records, dropped } = parseDatasetCsv([
            HEADER,
            '2022-12-31,BankA,2022,100,10,1000,900,100',
            ',BankA,,120,,1100,980,',
        ].join('\n'));

        expect(records).toHaveLength(1);
        expect(dropped).toEqual([
            { entityName: 'BankA', date: '', missing: ['netIncome', 'stockholdersEquity'] },
        ]);
        expect(console.warn).toHaveBeenCalledWith('[Dataset] Dropping BankA (no date): missing netIncome, stockholdersEquity');
    });

    it('should reject a file without a required column', () => {
        const error = captureError(() => parseDatasetCsv('period_end,entity_name,year,total_revenue\n2023-12-31,BankA,2023,1\n'));

        expect(error).toBeInstanceOf(DatasetError);
        expect(error).toMatchObject({ code: 'MISSING_COLUMN', message: 'Missing required column "net_income"' });
    });

    it('should reject a cell that is not a number', () => {
        const error = captureError(() => parseDatasetCsv(`${HEADER}\n2023-12-31,BankA,2023,abc,10,1000,900,100\n`));

        expect(error).toBeInstanceOf(DatasetError);
        expect(error).toMatchObject({ code: 'INVALID_ROW', row: 2 });
        expect(error).toHaveProperty('message', expect.stringContaining('Row 2: total_revenue'));
    });

    it('should reject a row whose year cannot be determined', () => {
        const error = captureError(() => parseDatasetCsv(`${HEADER}\nunknown,BankA,,100,10,1000,900,100\n`));
        expect(error).toMatchObject({ code: 'INVALID_ROW', message: 'Row 2: cannot determine the year for BankA' });
    });

    it('should reject a second row for the same bank and year', () => {
        const error = captureError(() => parseDatasetCsv([
            HEADER,
            '2023-06-30,BankA,2023,100,10,1000,900,100',
            '2023-12-31,BankA,2023,120,15,1100,980,120',
        ].join('\n')));

        expect(error).toMatchObject({ code: 'DUPLICATE_PERIOD', row: 3 });
    });

    it('should write absent values as empty cells', () => {
        const lines = serializeDatasetCsv(enriched(BANK_A)).split('\n');

        expect(lines[0]).toBe(OUTPUT_COLUMNS.join(','));
        expect(lines[1]).toBe('2022-12-31,BankA,2022,100,10,1000,900,100,0.1,0.01,10,9,10,,,,');
        expect(lines[2].endsWith(',2022')).toBe(true);
        expect(lines).toHaveLength(4);
        expect(lines[3]).toBe('');
    });

    it('should read back what it writes', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bank-dataset-'));
        const file = path.join(dir, 'nested', 'bank_financials.csv');
        try {
            await writeDataset(file, enriched(BANK_A));
            const records = await readDataset(file);

            expect(records).toEqual(enriched(BANK_A));
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    it('should refuse a dataset without complete rows', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bank-dataset-'));
        const file = path.join(dir, 'empty.csv');
        try {
            await fs.writeFile(file, `${HEADER}\n`, 'utf-8');
            const error = await captureRejection(readDataset(file));
            expect(error).toMatchObject({ code: 'EMPTY_DATASET' });
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});

describe('Dataset preparation', () => {
    const banks: BankProfile[] = [
        { name: 'BankA', ticker: 'BKA', color: '#111111' },
        { name: 'BankB', ticker: 'BKB', color: '#222222' },
    ];

    const bankAStatements: StatementBundle = {
        income: BANK_A.map(r => ({ date: `${r.year}-12-31`, totalRevenue: r.totalRevenue, netIncome: r.netIncome })),
        balance: BANK_A.map(r => ({
            date: `${r.year}-12-31`,
            totalAssets: r.totalAssets,
            totalLiabilities: r.totalLiabilities,
            stockholdersEquity: r.stockholdersEquity,
        })),
    };

    const fakeProvider = (byTicker: Record<string, StatementBundle>): StatementProvider => ({
        name: 'fake',
        getStatements: async (symbol: string) => {
            const statements = byTicker[symbol];
            if (!statements) throw new Error(`No statements for ${symbol}`);
            return statements;
        },
    });

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should skip a bank whose fetch fails and keep the others', async () => {
        const prepared = await collectDataset(fakeProvider({ BKA: bankAStatements }), banks);

        expect(prepared.records).toEqual(enriched(BANK_A));
        expect(prepared.failures).toEqual([{ bank: 'BankB', ticker: 'BKB', error: 'No statements for BKB' }]);
        expect(console.error).toHaveBeenCalledWith('[Dataset] Failed to load BankB: No statements for BKB');
    });

    it('should collect dropped rows from the loader', async () => {
        const prepared = await collectDataset(
            fakeProvider({
                BKA: bankAStatements,
                BKB: {
                    income: [{ date: '2023-12-31', totalRevenue: 50, netIncome: null }],
                    balance: [{ date: '2023-12-31', totalAssets: 500, totalLiabilities: 450, stockholdersEquity: 50 }],
                },
            }),
            banks
        );

        expect(prepared.dropped).toEqual([{ entityName: 'BankB', date: '2023-12-31', missing: ['netIncome'] }]);
        expect(prepared.records.map(r => r.entityName)).toEqual(['BankA', 'BankA']);
    });

    it('should fail when no bank produced a row', async () => {
        const error = await captureRejection(collectDataset(fakeProvider({}), banks));

        expect(error).toBeInstanceOf(DatasetError);
        expect(error).toMatchObject({ code: 'EMPTY_DATASET', message: 'No complete statements for BKA, BKB' });
    });

    it('should write the enriched dataset to disk', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bank-prepare-'));
        const file = path.join(dir, 'bank_financials.csv');
        try {
            await prepareDataset(fakeProvider({ BKA: bankAStatements }), banks, file);
            const text = await fs.readFile(file, 'utf-8');

            expect(text.split('\n')[1]).toBe('2022-12-31,BankA,2022,100,10,1000,900,100,0.1,0.01,10,9,10,,,,');
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
