
// ============ CORE VALUES ============

/** A numeric field that may be absent. `null` is never a stand-in for 0. */
export type Metric = number | null;

/**
 * Result of a computation that needs history or a non-zero base.
 * - `insufficient-data`: fewer than the required number of observations
 * - `undefined`: enough history, but the formula has no value (zero/absent base)
 */
export type Outcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'insufficient-data'; observations: number; required: number }
  | { status: 'undefined'; reason: string };

// ============ STATEMENTS ============

export type RawField =
  | 'totalRevenue'
  | 'netIncome'
  | 'totalAssets'
  | 'totalLiabilities'
  | 'stockholdersEquity';

export const RAW_FIELDS: readonly RawField[] = [
  'totalRevenue',
  'netIncome',
  'totalAssets',
  'totalLiabilities',
  'stockholdersEquity',
];

/** One provider income-statement row, keyed by report date (YYYY-MM-DD). */
export interface IncomeStatementRow {
  date: string;
  totalRevenue: Metric;
  netIncome: Metric;
}

/** One provider balance-sheet row, keyed by report date (YYYY-MM-DD). */
export interface BalanceSheetRow {
  date: string;
  totalAssets: Metric;
  totalLiabilities: Metric;
  stockholdersEquity: Metric;
}

export interface StatementBundle {
  income: IncomeStatementRow[];
  balance: BalanceSheetRow[];
}

// ============ RECORDS ============

export interface RawFinancialRecord {
  readonly entityName: string;
  readonly year: number;
  readonly periodEnd: string | null;
  readonly totalRevenue: number;
  readonly netIncome: number;
  readonly totalAssets: number;
  readonly totalLiabilities: number;
  readonly stockholdersEquity: number;
}

export interface RatioFields {
  readonly roe: Metric;
  readonly roa: Metric;
  readonly profitMargin: Metric;    // %
  readonly leverageRatio: Metric;
  readonly equityRatio: Metric;     // %
}

export interface GrowthFields {
  readonly revenueGrowth: Metric;   // %
  readonly netIncomeGrowth: Metric; // %
  readonly assetsGrowth: Metric;    // %
  readonly growthBaseYear: number | null;
}

export type RatioRecord = RawFinancialRecord & RatioFields;

export type FinancialRecord = RatioRecord & GrowthFields;

export interface DroppedRow {
  entityName: string;
  date: string;
  missing: RawField[];
}

// ============ ANALYSIS ============

export type ProjectedMetric = 'roe' | 'roa' | 'profitMargin' | 'leverageRatio';

export type InsufficientLabel = 'insufficient-data';
export type RoePerformance = 'high' | 'moderate' | InsufficientLabel;
export type Stability = 'stable' | 'variable' | InsufficientLabel;
export type GrowthTrend = 'growth' | 'decline' | InsufficientLabel;
export type Profitability = 'strong' | 'moderate' | 'weak' | InsufficientLabel;

export interface AnalysisSummary {
  roePerformance: RoePerformance;
  stability: Stability;
  growthTrend: GrowthTrend;
  profitability: Profitability;
}

export interface ProjectionPoint {
  year: number;
  value: number;
}

export interface TrendProjection {
  metric: ProjectedMetric;
  slope: number;
  intercept: number;
  direction: 'up' | 'down';
  points: ProjectionPoint[];
}

export interface BankAnalysis {
  entityName: string;
  latestYear: number;
  yearsAvailable: number[];

  latestRoe: Metric;
  latestRoa: Metric;
  latestMargin: Metric;
  latestLeverage: Metric;
  avgRoe: Metric;
  roeChange: Outcome<number>;
  roeVolatility: Outcome<number>;

  summary: AnalysisSummary;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  projections: Record<ProjectedMetric, Outcome<TrendProjection>>;
}

export interface DatasetAnalysis {
  firstYear: number;
  latestYear: number;
  banks: BankAnalysis[];
}

// ============ CONFIG ============

export interface BankProfile {
  name: string;
  ticker: string;
  color: string;
}
