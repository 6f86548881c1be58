
/**
 * Yahoo Finance fundamentals time series client.
 * No key required. Annual figures come back as one series per field, each
 * entry keyed by its `asOfDate`.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { fetchWithRetry, ApiError } from '../utils/retry';
import type { RetryOptions } from '../utils/retry';
import type { Metric, StatementBundle } from '../../types';
import type { StatementProvider } from './provider';

export const YAHOO_FIELDS = {
  totalRevenue: 'annualTotalRevenue',
  netIncome: 'annualNetIncome',
  totalAssets: 'annualTotalAssets',
  totalLiabilities: 'annualTotalLiabilitiesNetMinorityInterest',
  stockholdersEquity: 'annualStockholdersEquity',
} as const;

type YahooField = keyof typeof YAHOO_FIELDS;

const FIELD_BY_TYPE = new Map<string, YahooField>([
  [YAHOO_FIELDS.totalRevenue, 'totalRevenue'],
  [YAHOO_FIELDS.netIncome, 'netIncome'],
  [YAHOO_FIELDS.totalAssets, 'totalAssets'],
  [YAHOO_FIELDS.totalLiabilities, 'totalLiabilities'],
  [YAHOO_FIELDS.stockholdersEquity, 'stockholdersEquity'],
]);

const SeriesEntrySchema = z
  .object({
    asOfDate: z.string(),
    reportedValue: z.object({ raw: z.number().nullable().optional() }).optional(),
  })
  .nullable();

const TimeseriesSchema = z.object({
  timeseries: z.object({
    result: z
      .array(
        z
          .object({ meta: z.object({ type: z.array(z.string()) }) })
          .catchall(z.unknown())
      )
      .nullable(),
    error: z.unknown().optional(),
  }),
});

export interface YahooClientOptions {
  baseUrl?: string;
  http?: AxiosInstance;
  retry?: RetryOptions;
  /** Unix seconds; defaults to the start of 2000 */
  period1?: number;
  now?: () => number;
}

export class YahooClient implements StatementProvider {
  readonly name = 'yahoo';
  private readonly http: AxiosInstance;
  private readonly retry: RetryOptions;
  private readonly period1: number;
  private readonly now: () => number;

  constructor(options: YahooClientOptions = {}) {
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl ?? 'https://query2.finance.yahoo.com',
      timeout: 15000,
      headers: { 'User-Agent': 'Mozilla/5.0 (compatible; bank-statement-analyzer)' },
    });
    this.retry = options.retry ?? { maxRetries: 2, delayMs: 1000, backoffMultiplier: 2 };
    this.period1 = options.period1 ?? 946684800;
    this.now = options.now ?? Date.now;
  }

  private async fetchSeries(symbol: string): Promise<Map<YahooField, Map<string, Metric>>> {
    const types = Object.values(YAHOO_FIELDS).join(',');

    const payload = await fetchWithRetry(async () => {
      try {
        const res = await this.http.get<unknown>(
          `/ws/fundamentals-timeseries/v1/finance/timeseries/${encodeURIComponent(symbol)}`,
          { params: { type: types, period1: this.period1, period2: Math.floor(this.now() / 1000) } }
        );
        return res.data;
      } catch (err) {
        if (axios.isAxiosError(err)) {
          const status = err.response?.status;
          if (status === 429) throw new ApiError('RATE_LIMIT', 'Yahoo rate limit');
          if (status === 404) throw new ApiError('NOT_FOUND', `Yahoo has no fundamentals for ${symbol}`);
          throw new ApiError('NETWORK', `Yahoo request failed: ${status ?? err.message}`);
        }
        throw err;
      }
    }, this.retry);

    const parsed = TimeseriesSchema.safeParse(payload);
    if (!parsed.success || !parsed.data.timeseries.result) {
      throw new ApiError('UNKNOWN', `Unexpected Yahoo timeseries payload for ${symbol}`);
    }

    const series = new Map<YahooField, Map<string, Metric>>();
    for (const result of parsed.data.timeseries.result) {
      const type = result.meta.type[0];
      const field = type ? FIELD_BY_TYPE.get(type) : undefined;
      if (!type || !field) continue;

      const entries = z.array(SeriesEntrySchema).safeParse(result[type] ?? []);
      if (!entries.success) {
        console.warn(`[Yahoo] Skipping malformed ${type} series for ${symbol}`);
        continue;
      }
      const values = new Map<string, Metric>();
      for (const entry of entries.data) {
        if (!entry) continue;
        const raw = entry.reportedValue?.raw;
        values.set(entry.asOfDate, raw == null || !Number.isFinite(raw) ? null : raw);
      }
      series.set(field, values);
    }
    return series;
  }

  async getStatements(symbol: string): Promise<StatementBundle> {
    console.log(`[Yahoo] Fetching fundamentals for ${symbol}`);
    const series = await this.fetchSeries(symbol);
    const pick = (field: YahooField, date: string): Metric => series.get(field)?.get(date) ?? null;

    const incomeDates = new Set([
      ...(series.get('totalRevenue')?.keys() ?? []),
      ...(series.get('netIncome')?.keys() ?? []),
    ]);
    const balanceDates = new Set([
      ...(series.get('totalAssets')?.keys() ?? []),
      ...(series.get('totalLiabilities')?.keys() ?? []),
      ...(series.get('stockholdersEquity')?.keys() ?? []),
    ]);

    return {
      income: [...incomeDates].sort().map(date => ({
        date,
        totalRevenue: pick('totalRevenue', date),
        netIncome: pick('netIncome', date),
      })),
      balance: [...balanceDates].sort().map(date => ({
        date,
        totalAssets: pick('totalAssets', date),
        totalLiabilities: pick('totalLiabilities', date),
        stockholdersEquity: pick('stockholdersEquity', date),
      })),
    };
  }
}
