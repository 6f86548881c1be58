import React from 'react';
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Legend,
  ReferenceLine,
} from 'recharts';
import type { YearRow } from '../../../services/report/chartData';

interface MetricLineChartProps {
  title: string;
  rows: YearRow[];
  banks: string[];
  colorFor: (bank: string) => string;
  width?: number;
  height?: number;
  zeroLine?: boolean;
  showLegend?: boolean;
}

// Fixed size: the chart is rendered to static markup, there is no container to measure.
const MetricLineChart: React.FC<MetricLineChartProps> = ({
  title,
  rows,
  banks,
  colorFor,
  width = 560,
  height = 320,
  zeroLine = false,
  showLegend = true,
}) => {
  return (
    <figure className="bg-white rounded-xl border border-slate-200 p-4">
      <figcaption className="text-sm font-semibold text-slate-700 mb-2">{title}</figcaption>
      <LineChart width={width} height={height} data={rows} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" vertical={false} />
        <XAxis dataKey="year" stroke="#64748b" tick={{ fontSize: 12 }} />
        <YAxis stroke="#64748b" tick={{ fontSize: 12 }} width={60} />
        {zeroLine && <ReferenceLine y={0} stroke="#94a3b8" strokeDasharray="4 4" />}
        {showLegend && <Legend />}
        {banks.map(bank => (
          <Line
            key={bank}
            name={bank}
            type="monotone"
            dataKey={(row: YearRow) => row.values[bank]}
            stroke={colorFor(bank)}
            strokeWidth={3}
            dot={{ r: 4 }}
            connectNulls={false}
            isAnimationActive={false}
          />
        ))}
      </LineChart>
    </figure>
  );
};

export default MetricLineChart;
