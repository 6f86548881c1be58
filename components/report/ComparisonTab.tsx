import React from 'react';
import { Scale, Target, Landmark, Info } from 'lucide-react';
import MetricLineChart from './charts/MetricLineChart';
import RadarComparison from './charts/RadarComparison';
import RiskReturnScatter from './charts/RiskReturnScatter';
import { datasetMedian, pivotByYear, radarData, riskReturnPoints } from '../../services/report/chartData';
import { formatNumber, formatPercent } from '../../services/utils/format';
import { ANALYSIS } from '../../config/analysisConfig';
import type { FinancialRecord } from '../../types';

interface ComparisonTabProps {
  records: FinancialRecord[];
  banks: string[];
  latestYear: number;
  colorFor: (bank: string) => string;
}

const QUADRANTS = [
  ['Top-left', 'High ROE + low leverage = ideal profile'],
  ['Top-right', 'High ROE + high leverage = strong but risky'],
  ['Bottom-left', 'Low ROE + low leverage = prudent, room to develop'],
  ['Bottom-right', 'Low ROE + high leverage = at-risk situation'],
] as const;

const ComparisonTab: React.FC<ComparisonTabProps> = ({ records, banks, latestYear, colorFor }) => {
  const latest = records
    .filter(r => r.year === latestYear)
    .sort((a, b) => a.entityName.localeCompare(b.entityName));

  return (
    <div className="section bg-white rounded-xl border border-slate-200 p-8 my-5">
      <h2 className="section-title text-2xl font-semibold mb-6 pb-3 border-b-2 border-slate-200 flex items-center gap-2">
        <Scale size={22} /> Comparative analysis
      </h2>

      <h3 className="text-xl font-semibold mb-4">Comparison table {latestYear}</h3>
      <table id="comparison-table" className="comparison-table w-full text-sm mb-8">
        <thead>
          <tr className="bg-slate-50">
            <th className="p-3 text-left">Bank</th>
            <th className="p-3 text-left">ROE</th>
            <th className="p-3 text-left">ROA</th>
            <th className="p-3 text-left">Margin (%)</th>
            <th className="p-3 text-left">Leverage</th>
            <th className="p-3 text-left">Equity ratio (%)</th>
          </tr>
        </thead>
        <tbody>
          {latest.map(row => (
            <tr key={row.entityName} className="border-b border-slate-100">
              <td className="p-3"><strong style={{ color: colorFor(row.entityName) }}>{row.entityName}</strong></td>
              <td className="p-3">{formatNumber(row.roe, 3)}</td>
              <td className="p-3">{formatNumber(row.roa, 3)}</td>
              <td className="p-3">{formatPercent(row.profitMargin, 2)}</td>
              <td className="p-3">{formatNumber(row.leverageRatio, 2)}</td>
              <td className="p-3">{formatPercent(row.equityRatio, 2)}</td>
            </tr>
          ))}
        </tbody>
      </table>

      <h3 className="text-xl font-semibold mt-10 mb-4 flex items-center gap-2">
        <Target size={20} /> Multi-dimensional performance
      </h3>
      <p className="text-slate-500 leading-relaxed mb-4">
        Each axis is normalised across banks for {latestYear}: the larger the area, the stronger the overall profile.
      </p>
      <RadarComparison rows={radarData(records, latestYear)} banks={banks} colorFor={colorFor} latestYear={latestYear} />

      <h3 className="text-xl font-semibold mt-10 mb-4">Risk / return trade-off</h3>
      <p className="text-slate-500 leading-relaxed mb-4">
        The dashed median lines split the plane into four quadrants:
      </p>
      <ul className="bg-slate-50 rounded-lg p-4 mb-4">
        {QUADRANTS.map(([corner, meaning]) => (
          <li key={corner} className="py-1"><strong>{corner}</strong>: {meaning}</li>
        ))}
      </ul>
      <RiskReturnScatter
        points={riskReturnPoints(records)}
        colorFor={colorFor}
        medianLeverage={datasetMedian(records, 'leverageRatio')}
        medianRoe={datasetMedian(records, 'roe')}
      />

      <h3 className="text-xl font-semibold mt-10 mb-4 flex items-center gap-2">
        <Landmark size={20} /> Financial structure
      </h3>
      <div id="structure-charts" className="grid grid-cols-1 lg:grid-cols-2 gap-4">
        <MetricLineChart title="Leverage ratio" rows={pivotByYear(records, 'leverageRatio')} banks={banks} colorFor={colorFor} width={520} />
        <MetricLineChart title="Equity ratio (%)" rows={pivotByYear(records, 'equityRatio')} banks={banks} colorFor={colorFor} width={520} showLegend={false} />
        <MetricLineChart title="Total assets (bn)" rows={pivotByYear(records, 'totalAssets', 1e9)} banks={banks} colorFor={colorFor} width={520} showLegend={false} />
        <MetricLineChart title="Stockholders' equity (bn)" rows={pivotByYear(records, 'stockholdersEquity', 1e9)} banks={banks} colorFor={colorFor} width={520} showLegend={false} />
      </div>

      <div className="regulatory-note bg-blue-50 border-l-4 border-blue-500 rounded-lg p-5 mt-6 text-blue-900">
        <h4 className="font-semibold mb-2 flex items-center gap-2"><Info size={18} /> Basel III</h4>
        <p>
          Banks must hold minimum capital ratios. An <strong>equity ratio above {ANALYSIS.REGULATORY.EQUITY_RATIO_STRONG}%</strong> indicates
          strong capitalisation, and <strong>leverage below {ANALYSIS.REGULATORY.LEVERAGE_CEILING}</strong> a robust financial structure.
        </p>
      </div>
    </div>
  );
};

export default ComparisonTab;
