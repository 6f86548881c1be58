/**
 * Centralized Analysis Configuration
 *
 * Thresholds used by the analysis engine and the report.
 * Ratios (ROE, ROA) are fractions; margins and growth rates are percentages.
 */

export const ANALYSIS = {
    LABELS: {
        STABLE_ROE_STD: 0.02,      // std(ROE) below this -> 'stable'
        MARGIN_STRONG: 20,         // % -> 'strong'
        MARGIN_MODERATE: 10,       // % -> 'moderate'
    },
    DIAGNOSTICS: {
        MARGIN_SOLID: 15,          // % strength above, recommendation below
        LEVERAGE_ROBUST: 12,       // strength below, recommendation above
    },
    PROJECTION: {
        DEFAULT_YEARS: 3,
        MIN_POINTS: 2,
    },
    HISTORY: {
        MIN_YEARS: 2,              // roe change, volatility
    },
    REGULATORY: {
        EQUITY_RATIO_STRONG: 8,    // % (Basel III guidance shown in the report)
        LEVERAGE_CEILING: 12,
    },
} as const;
