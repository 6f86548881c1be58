import React from 'react';
import { Building2, ThumbsUp, AlertTriangle, Lightbulb, CheckCircle, AlertCircle, ArrowRight, LineChart } from 'lucide-react';
import MetricBox from './MetricBox';
import { labelText } from './labels';
import { PROJECTED_METRICS } from '../../services/analysis/analysisEngine';
import { formatNumber, formatOutcome, formatPercent, INSUFFICIENT_LABEL, MISSING_LABEL } from '../../services/utils/format';
import type { BankAnalysis, ProjectedMetric } from '../../types';

interface BankAnalysisSectionProps {
  analysis: BankAnalysis;
  color: string;
}

const PROJECTION_LABELS: Record<ProjectedMetric, { label: string; format: (v: number) => string }> = {
  roe: { label: 'ROE', format: v => formatNumber(v, 3) },
  roa: { label: 'ROA', format: v => formatNumber(v, 4) },
  profitMargin: { label: 'Profit margin', format: v => formatPercent(v, 1) },
  leverageRatio: { label: 'Leverage', format: v => formatNumber(v, 2) },
};

export const slugify = (name: string) =>
  name.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');

const BankAnalysisSection: React.FC<BankAnalysisSectionProps> = ({ analysis, color }) => {
  const { summary } = analysis;
  const fitted = PROJECTED_METRICS.map(m => analysis.projections[m]).find(o => o.status === 'ok');
  const horizon = fitted?.status === 'ok' ? fitted.value.points.map(p => p.year) : [];

  return (
    <div className="section bank-analysis bg-white rounded-xl border border-slate-200 p-8 my-5" id={`bank-${slugify(analysis.entityName)}`}>
      <div className="flex items-center mb-5 pb-4 border-b-2 border-slate-200">
        <div className="w-12 h-12 rounded-lg flex items-center justify-center mr-4" style={{ background: `${color}20`, color }}>
          <Building2 size={26} />
        </div>
        <div>
          <h2 className="text-2xl font-semibold m-0" style={{ color }}>{analysis.entityName}</h2>
          <p className="text-slate-500 mt-1">
            In-depth analysis, {analysis.yearsAvailable.length} year{analysis.yearsAvailable.length === 1 ? '' : 's'} of data
          </p>
        </div>
      </div>

      <div className="metric-grid grid grid-cols-2 md:grid-cols-4 gap-4 my-5">
        <MetricBox label="ROE" value={formatNumber(analysis.latestRoe, 3)} />
        <MetricBox label="ROA" value={formatNumber(analysis.latestRoa, 3)} />
        <MetricBox label="Margin" value={formatPercent(analysis.latestMargin)} />
        <MetricBox label="Leverage" value={formatNumber(analysis.latestLeverage, 2)} />
        <MetricBox label="Average ROE" value={formatNumber(analysis.avgRoe, 3)} />
        <MetricBox label="ROE change" value={formatOutcome(analysis.roeChange, v => formatPercent(v))} />
        <MetricBox label="Performance" value={labelText(summary.roePerformance)} accent="#10b981" emphasis />
        <MetricBox label="Trend" value={labelText(summary.growthTrend)} accent="#f59e0b" emphasis />
        <MetricBox label="Stability" value={labelText(summary.stability)} accent="#0ea5e9" emphasis />
        <MetricBox label="Profitability" value={labelText(summary.profitability)} accent="#8b5cf6" emphasis />
      </div>

      <div className="grid grid-cols-1 md:grid-cols-2 gap-6 mt-6">
        <div>
          <h4 className="text-lg font-semibold mb-3 flex items-center gap-2">
            <ThumbsUp size={18} color="#10b981" /> Strengths
          </h4>
          {analysis.strengths.map(text => (
            <div key={text} className="strength-item flex items-start gap-2 bg-green-50 border-l-4 border-emerald-500 text-green-800 rounded-lg px-4 py-3 mb-2">
              <CheckCircle size={16} /> <span>{text}</span>
            </div>
          ))}
        </div>
        <div>
          <h4 className="text-lg font-semibold mb-3 flex items-center gap-2">
            <AlertTriangle size={18} color="#ef4444" /> Areas for improvement
          </h4>
          {analysis.weaknesses.map(text => (
            <div key={text} className="weakness-item flex items-start gap-2 bg-red-50 border-l-4 border-red-500 text-red-800 rounded-lg px-4 py-3 mb-2">
              <AlertCircle size={16} /> <span>{text}</span>
            </div>
          ))}
        </div>
      </div>

      <h4 className="text-lg font-semibold mt-6 mb-3 flex items-center gap-2">
        <Lightbulb size={18} color="#3b82f6" /> Recommendations
      </h4>
      {analysis.recommendations.map(text => (
        <div key={text} className="recommendation-item flex items-start gap-2 bg-blue-50 border-l-4 border-blue-500 text-blue-800 rounded-lg px-4 py-3 mb-2">
          <ArrowRight size={16} /> <span>{text}</span>
        </div>
      ))}

      <h4 className="text-lg font-semibold mt-6 mb-3 flex items-center gap-2">
        <LineChart size={18} /> Linear trend projection
      </h4>
      <table className="projection-table w-full text-sm">
        <thead>
          <tr className="bg-slate-50">
            <th className="p-2 text-left">Metric</th>
            <th className="p-2 text-left">Direction</th>
            {horizon.map(year => <th key={year} className="p-2 text-left">{year}</th>)}
          </tr>
        </thead>
        <tbody>
          {PROJECTED_METRICS.map(metric => {
            const outcome = analysis.projections[metric];
            const { label, format } = PROJECTION_LABELS[metric];
            return (
              <tr key={metric} data-metric={metric} className="border-b border-slate-100">
                <td className="p-2">{label}</td>
                {outcome.status === 'ok' ? (
                  <>
                    <td className="p-2">{outcome.value.direction === 'up' ? 'Up' : 'Down'}</td>
                    {outcome.value.points.map(p => <td key={p.year} className="p-2">{format(p.value)}</td>)}
                  </>
                ) : (
                  <td className="p-2" colSpan={horizon.length + 1}>
                    {outcome.status === 'insufficient-data' ? INSUFFICIENT_LABEL : MISSING_LABEL}
                  </td>
                )}
              </tr>
            );
          })}
        </tbody>
      </table>
    </div>
  );
};

export default BankAnalysisSection;
