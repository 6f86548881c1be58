import React from 'react';
import { Star, TrendingUp, BarChart3, Activity } from 'lucide-react';
import MetricBox from './MetricBox';
import MetricLineChart from './charts/MetricLineChart';
import { distribution, pivotByYear } from '../../services/report/chartData';
import type { RecordMetric } from '../../services/report/chartData';
import { formatNumber, formatPercent } from '../../services/utils/format';
import type { FinancialRecord, Metric } from '../../types';

interface SummaryTabProps {
  records: FinancialRecord[];
  banks: string[];
  firstYear: number;
  latestYear: number;
  colorFor: (bank: string) => string;
}

export const INDICATOR_COUNT = 8;

const DISTRIBUTION_METRICS: Array<{ metric: RecordMetric; label: string; format: (v: Metric) => string }> = [
  { metric: 'roe', label: 'ROE', format: v => formatNumber(v, 3) },
  { metric: 'roa', label: 'ROA', format: v => formatNumber(v, 4) },
  { metric: 'profitMargin', label: 'Profit margin', format: v => formatPercent(v, 2) },
];

const SummaryTab: React.FC<SummaryTabProps> = ({ records, banks, firstYear, latestYear, colorFor }) => {
  return (
    <div className="section bg-white rounded-xl border border-slate-200 p-8 my-5">
      <h2 className="section-title text-2xl font-semibold mb-6 pb-3 border-b-2 border-slate-200 flex items-center gap-2">
        <Star size={22} /> Executive summary
      </h2>
      <p>
        Comparative analysis of {banks.length} banks over {firstYear}-{latestYear}.
      </p>

      <div className="metric-grid grid grid-cols-1 md:grid-cols-3 gap-4 mt-6">
        <MetricBox label="Period" value={`${firstYear} - ${latestYear}`} />
        <MetricBox label="Banks" value={String(banks.length)} />
        <MetricBox label="Indicators" value={String(INDICATOR_COUNT)} />
      </div>

      <h3 className="text-xl font-semibold mt-8 mb-4 flex items-center gap-2">
        <TrendingUp size={20} /> Return on equity
      </h3>
      <p className="text-slate-500 leading-relaxed mb-4">
        <strong>Return on Equity (ROE)</strong> measures the profitability of shareholders' equity.
        Above 10% is considered excellent for a bank. The chart shows long-term trends and turning points.
      </p>
      <MetricLineChart
        title="Return on Equity (ROE)"
        rows={pivotByYear(records, 'roe')}
        banks={banks}
        colorFor={colorFor}
        width={1000}
        height={420}
      />

      <h3 className="text-xl font-semibold mt-10 mb-4 flex items-center gap-2">
        <BarChart3 size={20} /> Growth rates
      </h3>
      <p className="text-slate-500 leading-relaxed mb-4">
        Revenue, net income and asset growth show each bank's <strong>momentum</strong>. Net income growing faster
        than revenue points to better operating efficiency. The first year of each bank has no growth rate.
      </p>
      <div id="growth-charts" className="grid grid-cols-1 xl:grid-cols-3 gap-4">
        <MetricLineChart title="Revenue growth (%)" rows={pivotByYear(records, 'revenueGrowth')} banks={banks} colorFor={colorFor} width={400} zeroLine />
        <MetricLineChart title="Net income growth (%)" rows={pivotByYear(records, 'netIncomeGrowth')} banks={banks} colorFor={colorFor} width={400} zeroLine showLegend={false} />
        <MetricLineChart title="Asset growth (%)" rows={pivotByYear(records, 'assetsGrowth')} banks={banks} colorFor={colorFor} width={400} zeroLine showLegend={false} />
      </div>

      <h3 className="text-xl font-semibold mt-10 mb-4 flex items-center gap-2">
        <Activity size={20} /> Distribution and volatility
      </h3>
      <p className="text-slate-500 leading-relaxed mb-4">
        A narrow range means stable, predictable performance; a wide one means results vary strongly from year to year.
      </p>
      {DISTRIBUTION_METRICS.map(({ metric, label, format }) => (
        <table key={metric} className="distribution-table w-full mb-6 text-sm" data-metric={metric}>
          <caption className="text-left font-semibold mb-2">{label}</caption>
          <thead>
            <tr className="bg-slate-50">
              <th className="p-2 text-left">Bank</th>
              <th className="p-2 text-left">Min</th>
              <th className="p-2 text-left">Median</th>
              <th className="p-2 text-left">Max</th>
              <th className="p-2 text-left">Std dev</th>
            </tr>
          </thead>
          <tbody>
            {distribution(records, metric).map(row => (
              <tr key={row.bank} className="border-b border-slate-100">
                <td className="p-2" style={{ color: colorFor(row.bank) }}>{row.bank}</td>
                <td className="p-2">{format(row.min)}</td>
                <td className="p-2">{format(row.median)}</td>
                <td className="p-2">{format(row.max)}</td>
                <td className="p-2">{format(row.std)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      ))}
    </div>
  );
};

export default SummaryTab;
