import { describe, it, expect, vi } from 'vitest';
import {
    analyzeDataset,
    analyzeEntity,
    assessStrengths,
    recommend,
    RECOMMENDATIONS,
} from '../../services/analysis/analysisEngine';
import { projectLinearTrend } from '../../services/analysis/trendProjection';
import { DatasetError } from '../../services/dataset/datasetError';
import { BANK_A, enriched, rawRecord } from './fixtures';
import { captureError } from './helpers';

describe('Trend projection', () => {
    it('should extend a two-point ROE series one year ahead', () => {
        const outcome = projectLinearTrend('roe', [
            { year: 2022, value: 0.08 },
            { year: 2023, value: 0.1 },
        ], 2023);

        expect(outcome.status).toBe('ok');
        if (outcome.status !== 'ok') return;
        expect(outcome.value.direction).toBe('up');
        expect(outcome.value.points.map(p => p.year)).toEqual([2024, 2025, 2026]);
        expect(outcome.value.points[0].value).toBeCloseTo(0.12, 10);
        expect(outcome.value.points[2].value).toBeCloseTo(0.16, 10);
    });

    it('should skip missing observations', () => {
        const outcome = projectLinearTrend('roa', [
            { year: 2021, value: null },
            { year: 2022, value: 0.02 },
            { year: 2023, value: 0.01 },
        ], 2023, 1);

        expect(outcome.status).toBe('ok');
        if (outcome.status !== 'ok') return;
        expect(outcome.value.direction).toBe('down');
        expect(outcome.value.points).toHaveLength(1);
        expect(outcome.value.points[0].value).toBeCloseTo(0, 10);
    });

    it('should report insufficient data with a single observation', () => {
        expect(projectLinearTrend('roe', [{ year: 2023, value: 0.1 }, { year: 2022, value: null }], 2023)).toEqual({
            status: 'insufficient-data',
            observations: 1,
            required: 2,
        });
    });
});

describe('Analysis Engine', () => {
    it('should analyse the BankA scenario', () => {
        const analysis = analyzeEntity(enriched(BANK_A));

        expect(analysis.latestYear).toBe(2023);
        expect(analysis.latestRoe).toBeCloseTo(0.125, 10);
        expect(analysis.latestMargin).toBeCloseTo(12.5, 10);
        expect(analysis.avgRoe).toBeCloseTo(0.1125, 10);
        expect(analysis.roeChange.status).toBe('ok');
        if (analysis.roeChange.status === 'ok') {
            expect(analysis.roeChange.value).toBeCloseTo(25, 8);
        }
        expect(analysis.summary).toEqual({
            roePerformance: 'high',
            stability: 'stable',
            growthTrend: 'growth',
            profitability: 'moderate',
        });
        expect(analysis.strengths).toEqual([
            expect.stringMatching(/^ROE above its historical average \(0\.125 vs 0\.11\d\)$/),
            'ROE improved by 25.0% over the period',
            'Robust financial structure (leverage of 8.17)',
        ]);
        expect(analysis.weaknesses).toEqual(['Profit margin to optimise (12.5%)']);
        expect(analysis.recommendations).toEqual([RECOMMENDATIONS.MARGIN]);
    });

    it('should fit each projected metric on its own series', () => {
        const analysis = analyzeEntity(enriched(BANK_A));
        const { roe, leverageRatio } = analysis.projections;

        expect(roe.status === 'ok' && roe.value.direction).toBe('up');
        expect(leverageRatio.status === 'ok' && leverageRatio.value.direction).toBe('down');
    });

    it('should label a constant ROE as a decline with no change', () => {
        const analysis = analyzeEntity(enriched([
            rawRecord('BankC', 2021),
            rawRecord('BankC', 2022),
            rawRecord('BankC', 2023),
        ]));

        expect(analysis.roeChange).toEqual({ status: 'ok', value: 0 });
        expect(analysis.summary.growthTrend).toBe('decline');
        expect(analysis.summary.stability).toBe('stable');
        expect(analysis.summary.roePerformance).toBe('moderate');
    });

    it('should always produce four strengths and weaknesses', () => {
        const scenarios = [
            BANK_A,
            [rawRecord('BankD', 2023)],
            [rawRecord('BankE', 2022, { netIncome: 0 }), rawRecord('BankE', 2023, { stockholdersEquity: 0 })],
            [rawRecord('BankF', 2022, { netIncome: 30 }), rawRecord('BankF', 2023, { netIncome: -5, totalLiabilities: 2000 })],
        ];
        for (const records of scenarios) {
            const analysis = analyzeEntity(enriched(records));
            expect(analysis.strengths.length + analysis.weaknesses.length).toBe(4);
        }
    });

    it('should fall back to a single maintain recommendation', () => {
        const analysis = analyzeEntity(enriched([
            rawRecord('BankG', 2022, { netIncome: 20 }),
            rawRecord('BankG', 2023, { netIncome: 20 }),
        ]));

        expect(analysis.recommendations).toEqual([RECOMMENDATIONS.MAINTAIN]);
    });

    it('should not recommend anything at the exact thresholds', () => {
        expect(recommend({ latestMargin: 15, latestLeverage: 12, roeChange: { status: 'ok', value: 0 } })).toEqual([
            RECOMMENDATIONS.MAINTAIN,
        ]);
    });

    it('should list every recommendation that fires, in order', () => {
        expect(recommend({ latestMargin: 5, latestLeverage: 20, roeChange: { status: 'ok', value: -10 } })).toEqual([
            RECOMMENDATIONS.MARGIN,
            RECOMMENDATIONS.LEVERAGE,
            RECOMMENDATIONS.TREND,
        ]);
    });

    it('should treat leverage of exactly 12 as a weakness', () => {
        const { strengths, weaknesses } = assessStrengths({
            latestYear: 2023,
            latestRoe: 0.1,
            avgRoe: 0.1,
            latestMargin: 16,
            latestLeverage: 12,
            roeChange: { status: 'ok', value: 0 },
        });

        expect(strengths).toEqual(['Solid profit margin of 16.0%']);
        expect(weaknesses).toEqual([
            'ROE below its historical average',
            'ROE declined by 0.0% over the period',
            'High level of debt (leverage of 12.00)',
        ]);
    });

    it('should report insufficient history for a single year', () => {
        const analysis = analyzeEntity(enriched([rawRecord('BankD', 2023)]));

        expect(analysis.roeChange).toEqual({ status: 'insufficient-data', observations: 1, required: 2 });
        expect(analysis.roeVolatility).toEqual({ status: 'insufficient-data', observations: 1, required: 2 });
        expect(analysis.summary.growthTrend).toBe('insufficient-data');
        expect(analysis.summary.stability).toBe('insufficient-data');
        expect(analysis.projections.roe.status).toBe('insufficient-data');
        expect(analysis.weaknesses).toContain('ROE trend unavailable (insufficient data: 1 of 2 years)');
    });

    it('should leave the ROE change undefined when the first ROE is zero', () => {
        const analysis = analyzeEntity(enriched([
            rawRecord('BankE', 2022, { netIncome: 0 }),
            rawRecord('BankE', 2023),
        ]));

        expect(analysis.roeChange).toEqual({ status: 'undefined', reason: 'ROE for 2022 is zero' });
        expect(analysis.summary.growthTrend).toBe('insufficient-data');
        expect(analysis.weaknesses).toContain('ROE trend unavailable (ROE for 2022 is zero)');
    });

    it('should reject records from more than one bank', () => {
        expect(() => analyzeEntity(enriched([rawRecord('BankA', 2023), rawRecord('BankB', 2023)]))).toThrow(
            'analyzeEntity expects one bank, got "BankA" and "BankB"'
        );
    });

    it('should reject an empty record set', () => {
        const error = captureError(() => analyzeEntity([]));
        expect(error).toBeInstanceOf(DatasetError);
        expect(error).toMatchObject({ code: 'EMPTY_DATASET' });
    });
});

describe('analyzeDataset', () => {
    it('should analyse every bank against the dataset-wide latest year', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const analysis = analyzeDataset(enriched([...BANK_A, rawRecord('BankB', 2022)]));

        expect(analysis.firstYear).toBe(2022);
        expect(analysis.latestYear).toBe(2023);
        expect(analysis.banks.map(b => b.entityName)).toEqual(['BankA', 'BankB']);

        const bankB = analysis.banks[1];
        expect(bankB.latestYear).toBe(2023);
        expect(bankB.latestRoe).toBeNull();
        expect(bankB.latestLeverage).toBeNull();
        expect(bankB.summary.roePerformance).toBe('insufficient-data');
        expect(bankB.summary.profitability).toBe('insufficient-data');
        expect(bankB.weaknesses).toEqual([
            'ROE for 2023 unavailable, no comparison with the historical average',
            'ROE trend unavailable (insufficient data: 1 of 2 years)',
            'Profit margin for 2023 unavailable',
            'Leverage for 2023 unavailable',
        ]);
        expect(bankB.recommendations).toEqual([RECOMMENDATIONS.MAINTAIN]);
    });

    it('should honour the projection horizon', () => {
        const analysis = analyzeDataset(enriched(BANK_A), { projectionYears: 5 });
        const roe = analysis.banks[0].projections.roe;

        expect(roe.status === 'ok' && roe.value.points.map(p => p.year)).toEqual([2024, 2025, 2026, 2027, 2028]);
    });
});
