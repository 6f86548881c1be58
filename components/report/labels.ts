import type { AnalysisSummary } from '../../types';
import { INSUFFICIENT_LABEL } from '../../services/utils/format';

const LABEL_TEXT: Record<string, string> = {
  high: 'High',
  moderate: 'Moderate',
  stable: 'Stable',
  variable: 'Variable',
  growth: 'Growth',
  decline: 'Decline',
  strong: 'Strong',
  weak: 'Weak',
  'insufficient-data': INSUFFICIENT_LABEL,
};

export const labelText = (label: AnalysisSummary[keyof AnalysisSummary]): string => LABEL_TEXT[label] ?? label;
