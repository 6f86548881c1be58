import { computeGrowthRates } from '../../services/pipeline/growthCalculator';
import { computeRatios } from '../../services/pipeline/ratioCalculator';
import type { FinancialRecord, RawFinancialRecord } from '../../types';

export const rawRecord = (
    entityName: string,
    year: number,
    values: Partial<Omit<RawFinancialRecord, 'entityName' | 'year'>> = {}
): RawFinancialRecord => ({
    entityName,
    year,
    periodEnd: `${year}-12-31`,
    totalRevenue: 100,
    netIncome: 10,
    totalAssets: 1000,
    totalLiabilities: 900,
    stockholdersEquity: 100,
    ...values,
});

/** The two-year BankA scenario used across the suite. */
export const BANK_A: RawFinancialRecord[] = [
    rawRecord('BankA', 2022, { totalRevenue: 100, netIncome: 10, totalAssets: 1000, totalLiabilities: 900, stockholdersEquity: 100 }),
    rawRecord('BankA', 2023, { totalRevenue: 120, netIncome: 15, totalAssets: 1100, totalLiabilities: 980, stockholdersEquity: 120 }),
];

export const enriched = (records: readonly RawFinancialRecord[]): FinancialRecord[] =>
    computeGrowthRates(computeRatios(records));

export const BANK_CSV = [
    'period_end,entity_name,year,total_revenue,net_income,total_assets,total_liabilities,stockholders_equity',
    '2022-12-31,BankA,2022,100,10,1000,900,100',
    '2023-12-31,BankA,2023,120,15,1100,980,120',
    '2022-12-31,BankB,2022,200,30,2000,1800,200',
    '2023-12-31,BankB,,250,40,2100,1850,250',
    '',
].join('\n');
