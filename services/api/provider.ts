import type { AppConfig } from '../../config/appConfig';
import type { StatementBundle } from '../../types';
import { FmpClient } from './fmp';
import { YahooClient } from './yahoo';

/** Source of annual income statements and balance sheets for a ticker. */
export interface StatementProvider {
  readonly name: string;
  getStatements(symbol: string): Promise<StatementBundle>;
}

export const createProvider = (config: AppConfig): StatementProvider => {
  switch (config.provider) {
    case 'fmp':
      return new FmpClient({ apiKey: config.fmpApiKey, baseUrl: config.fmpBaseUrl });
    case 'yahoo':
      return new YahooClient({ baseUrl: config.yahooBaseUrl });
  }
};

export const PROVIDER_LABELS: Record<AppConfig['provider'], string> = {
  fmp: 'Financial Modeling Prep',
  yahoo: 'Yahoo Finance',
};
