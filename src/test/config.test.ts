import { describe, it, expect, vi } from 'vitest';
import { getConfig } from '../../config/appConfig';
import { colorFor, loadBankUniverse, parseBankUniverse } from '../../config/bankUniverse';
import { captureError } from './helpers';

describe('App config', () => {
    it('should fall back to defaults', () => {
        expect(getConfig({})).toEqual({
            provider: 'yahoo',
            fmpApiKey: undefined,
            fmpBaseUrl: 'https://financialmodelingprep.com/stable',
            yahooBaseUrl: 'https://query2.finance.yahoo.com',
            datasetPath: 'data/bank_financials.csv',
            reportPath: 'reports/bank_dashboard.html',
            projectionYears: 3,
            port: 3001,
        });
    });

    it('should read overrides from the environment', () => {
        const config = getConfig({
            DATA_PROVIDER: ' FMP ',
            FMP_API_KEY: 'test-fmp-key',
            DATASET_PATH: '/tmp/banks.csv',
            PROJECTION_YEARS: '5',
            PORT: '8080',
        });

        expect(config).toMatchObject({
            provider: 'fmp',
            fmpApiKey: 'test-fmp-key',
            datasetPath: '/tmp/banks.csv',
            projectionYears: 5,
            port: 8080,
        });
    });

    it('should ignore invalid numbers and providers', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const config = getConfig({ DATA_PROVIDER: 'bloomberg', PROJECTION_YEARS: '-2', PORT: 'abc' });

        expect(config.provider).toBe('yahoo');
        expect(config.projectionYears).toBe(3);
        expect(config.port).toBe(3001);
        expect(warn).toHaveBeenCalledWith('[Config] Ignoring PROJECTION_YEARS=-2 (expected a positive integer), using 3');
        expect(warn).toHaveBeenCalledTimes(3);
    });
});

describe('Bank universe', () => {
    it('should load the bundled universe', () => {
        const universe = loadBankUniverse();

        expect(universe.banks.map(b => b.ticker)).toEqual(['BNP.PA', 'GLE.PA', 'ACA.PA']);
        expect(colorFor(universe, 'BNP Paribas')).toBe('#00915A');
        expect(colorFor(universe, 'Unlisted Bank')).toBe('#6366f1');
    });

    it('should accept JSON5 and default the fallback colour', () => {
        const universe = parseBankUniverse(`{
            // comment
            banks: [{ name: 'BankA', ticker: 'BKA', color: '#123456' },],
        }`);

        expect(universe).toEqual({
            banks: [{ name: 'BankA', ticker: 'BKA', color: '#123456' }],
            fallbackColor: '#6366f1',
        });
    });

    it('should reject an invalid colour', () => {
        expect(() => parseBankUniverse(`{ banks: [{ name: 'BankA', ticker: 'BKA', color: 'green' }] }`)).toThrow(
            'color must be a #rrggbb hex value'
        );
    });

    it('should reject a bank listed twice', () => {
        const error = captureError(() => parseBankUniverse(`{
            banks: [
                { name: 'BankA', ticker: 'BKA', color: '#123456' },
                { name: 'BankA', ticker: 'BKA2', color: '#654321' },
            ],
        }`));

        expect(error).toBeInstanceOf(Error);
        expect(error).toHaveProperty('message', 'Duplicate bank "BankA" in bank universe');
    });
});
