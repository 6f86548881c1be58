/**
 * Runtime configuration read from the environment.
 * Entry points load `.env` through `dotenv/config` before anything reads these.
 */

export type DataProvider = 'fmp' | 'yahoo';

export interface AppConfig {
  provider: DataProvider;
  fmpApiKey: string | undefined;
  fmpBaseUrl: string;
  yahooBaseUrl: string;
  datasetPath: string;
  reportPath: string;
  projectionYears: number;
  port: number;
}

const parsePositiveInt = (raw: string | undefined, fallback: number, name: string): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`[Config] Ignoring ${name}=${raw} (expected a positive integer), using ${fallback}`);
    return fallback;
  }
  return value;
};

const parseProvider = (raw: string | undefined): DataProvider => {
  if (!raw) return 'yahoo';
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'fmp' || normalized === 'yahoo') return normalized;
  console.warn(`[Config] Unknown DATA_PROVIDER "${raw}", falling back to yahoo`);
  return 'yahoo';
};

// Read lazily so tests and scripts can set variables before first use.
export const getConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  provider: parseProvider(env.DATA_PROVIDER),
  fmpApiKey: env.FMP_API_KEY || undefined,
  fmpBaseUrl: env.FMP_BASE_URL || 'https://financialmodelingprep.com/stable',
  yahooBaseUrl: env.YAHOO_BASE_URL || 'https://query2.finance.yahoo.com',
  datasetPath: env.DATASET_PATH || 'data/bank_financials.csv',
  reportPath: env.REPORT_PATH || 'reports/bank_dashboard.html',
  projectionYears: parsePositiveInt(env.PROJECTION_YEARS, 3, 'PROJECTION_YEARS'),
  port: parsePositiveInt(env.PORT, 3001, 'PORT'),
});
