import type { Metric, Outcome } from '../../types';

export const MISSING_LABEL = 'n/a';
export const INSUFFICIENT_LABEL = 'Insufficient data';

export function formatNumber(value: Metric, decimals = 2): string {
  if (value == null || !Number.isFinite(value)) return MISSING_LABEL;
  return value.toFixed(decimals);
}

export function formatPercent(value: Metric, decimals = 1): string {
  if (value == null || !Number.isFinite(value)) return MISSING_LABEL;
  return `${value.toFixed(decimals)}%`;
}

export function formatOutcome(outcome: Outcome<number>, format: (value: number) => string): string {
  switch (outcome.status) {
    case 'ok':
      return format(outcome.value);
    case 'insufficient-data':
      return INSUFFICIENT_LABEL;
    case 'undefined':
      return MISSING_LABEL;
  }
}
