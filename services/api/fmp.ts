
/**
 * Financial Modeling Prep API Client
 * Free tier: 250 requests/day
 * Docs: https://site.financialmodelingprep.com/developer/docs
 */

import { z } from 'zod';
import { getConfig } from '../../config/appConfig';
import { fetchWithRetry, ApiError } from '../utils/retry';
import type { RetryOptions } from '../utils/retry';
import type { BalanceSheetRow, IncomeStatementRow, StatementBundle } from '../../types';
import type { StatementProvider } from './provider';

const amount = z.number().nullable().optional().transform(v => (v == null || !Number.isFinite(v) ? null : v));

const IncomeStatementSchema = z.array(
  z.object({
    date: z.string(),
    revenue: amount,
    netIncome: amount,
  })
);

const BalanceSheetSchema = z.array(
  z.object({
    date: z.string(),
    totalAssets: amount,
    totalLiabilities: amount,
    totalStockholdersEquity: amount,
  })
);

export interface FmpClientOptions {
  apiKey?: string;
  baseUrl?: string;
  limit?: number;
  retry?: RetryOptions;
}

export class FmpClient implements StatementProvider {
  readonly name = 'fmp';
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly limit: number;
  private readonly retry: RetryOptions;

  constructor(options: FmpClientOptions = {}) {
    const config = getConfig();
    this.apiKey = options.apiKey ?? config.fmpApiKey;
    this.baseUrl = options.baseUrl ?? config.fmpBaseUrl;
    this.limit = options.limit ?? 10;
    this.retry = options.retry ?? { maxRetries: 2, delayMs: 1000, backoffMultiplier: 2 };
  }

  private validateApiKey(): string {
    if (!this.apiKey) {
      console.error('[FMP] API key is missing or empty.');
      throw new ApiError('MISSING_KEY', 'FMP_API_KEY not configured');
    }
    return this.apiKey;
  }

  private async fetchData(endpoint: string): Promise<unknown> {
    const apiKey = this.validateApiKey();

    return fetchWithRetry(async () => {
      const url = `${this.baseUrl}${endpoint}${endpoint.includes('?') ? '&' : '?'}apikey=${apiKey}`;
      console.log(`[FMP] Fetching ${endpoint}`);

      const res = await fetch(url);

      if (res.status === 429) {
        throw new ApiError('RATE_LIMIT', 'FMP API rate limit exceeded');
      }
      if (res.status === 401 || res.status === 403) {
        throw new ApiError('MISSING_KEY', `FMP rejected the API key (${res.status})`);
      }
      if (res.status === 404) {
        throw new ApiError('NOT_FOUND', `FMP resource not found: ${endpoint}`);
      }
      if (!res.ok) {
        throw new ApiError('NETWORK', `FMP API Error: ${res.status}`);
      }

      const data: unknown = await res.json();

      // FMP sometimes returns error messages in 200 OK responses
      if (data && typeof data === 'object' && 'Error Message' in data) {
        throw new ApiError('UNKNOWN', String(data['Error Message']));
      }
      return data;
    }, this.retry);
  }

  async getIncomeStatements(symbol: string): Promise<IncomeStatementRow[]> {
    const data = await this.fetchData(`/income-statement?symbol=${encodeURIComponent(symbol)}&period=annual&limit=${this.limit}`);
    const rows = IncomeStatementSchema.safeParse(data);
    if (!rows.success) {
      throw new ApiError('UNKNOWN', `Unexpected FMP income statement payload for ${symbol}`);
    }
    return rows.data.map(r => ({ date: r.date, totalRevenue: r.revenue, netIncome: r.netIncome }));
  }

  async getBalanceSheets(symbol: string): Promise<BalanceSheetRow[]> {
    const data = await this.fetchData(`/balance-sheet-statement?symbol=${encodeURIComponent(symbol)}&period=annual&limit=${this.limit}`);
    const rows = BalanceSheetSchema.safeParse(data);
    if (!rows.success) {
      throw new ApiError('UNKNOWN', `Unexpected FMP balance sheet payload for ${symbol}`);
    }
    return rows.data.map(r => ({
      date: r.date,
      totalAssets: r.totalAssets,
      totalLiabilities: r.totalLiabilities,
      stockholdersEquity: r.totalStockholdersEquity,
    }));
  }

  async getStatements(symbol: string): Promise<StatementBundle> {
    // Sequential to stay inside the free tier's rate limit
    const income = await this.getIncomeStatements(symbol);
    const balance = await this.getBalanceSheets(symbol);
    return { income, balance };
  }
}
