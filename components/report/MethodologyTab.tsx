import React from 'react';
import { BookOpen, Database, Calculator, SlidersHorizontal } from 'lucide-react';
import { ANALYSIS } from '../../config/analysisConfig';

interface MethodologyTabProps {
  providerName: string;
  projectionYears: number;
}

const FORMULAS = [
  ['ROE', 'Net income / Stockholders\' equity'],
  ['ROA', 'Net income / Total assets'],
  ['Profit margin', 'Net income / Total revenue x 100'],
  ['Leverage ratio', 'Total liabilities / Stockholders\' equity'],
  ['Equity ratio', 'Stockholders\' equity / Total assets x 100'],
  ['Growth rate', '(Current - Previous) / Previous x 100, previous = prior available year of the same bank'],
] as const;

const MethodologyTab: React.FC<MethodologyTabProps> = ({ providerName, projectionYears }) => {
  const { LABELS, DIAGNOSTICS } = ANALYSIS;
  const thresholds = [
    `Performance "High" when the latest ROE exceeds the bank's average ROE`,
    `Stability "Stable" when the standard deviation of ROE is below ${LABELS.STABLE_ROE_STD}`,
    `Trend "Growth" when ROE rose between the first and last year (a change of exactly 0 is a decline)`,
    `Profitability "Strong" above ${LABELS.MARGIN_STRONG}% margin, "Moderate" above ${LABELS.MARGIN_MODERATE}%, otherwise "Weak"`,
    `Margin strength above ${DIAGNOSTICS.MARGIN_SOLID}%, leverage strength below ${DIAGNOSTICS.LEVERAGE_ROBUST}`,
  ];

  return (
    <div className="section bg-white rounded-xl border border-slate-200 p-8 my-5">
      <h2 className="section-title text-2xl font-semibold mb-6 pb-3 border-b-2 border-slate-200 flex items-center gap-2">
        <BookOpen size={22} /> Methodology and interpretation
      </h2>
      <div className="grid grid-cols-1 md:grid-cols-2 gap-8">
        <div>
          <h4 className="text-lg font-semibold mb-3 flex items-center gap-2"><Database size={18} /> Data sources</h4>
          <ul className="list-disc pl-5 text-slate-600 space-y-1">
            <li>Annual income statements and balance sheets ({providerName})</li>
            <li>Rows missing any required figure are excluded</li>
            <li>Values shown as "n/a" are undefined (zero or missing denominator), never zero</li>
          </ul>
        </div>
        <div>
          <h4 className="text-lg font-semibold mb-3 flex items-center gap-2"><Calculator size={18} /> Formulas</h4>
          <dl className="text-slate-600">
            {FORMULAS.map(([name, formula]) => (
              <div key={name} className="mb-2">
                <dt className="font-semibold">{name}</dt>
                <dd>{formula}</dd>
              </div>
            ))}
          </dl>
        </div>
      </div>
      <h4 className="text-lg font-semibold mt-6 mb-3 flex items-center gap-2"><SlidersHorizontal size={18} /> Thresholds</h4>
      <ul className="list-disc pl-5 text-slate-600 space-y-1">
        {thresholds.map(t => <li key={t}>{t}</li>)}
        <li>
          Projections: least-squares line per metric over the available years, extended {projectionYears} year
          {projectionYears === 1 ? '' : 's'}; at least {ANALYSIS.PROJECTION.MIN_POINTS} years are required
        </li>
      </ul>
    </div>
  );
};

export default MethodologyTab;
