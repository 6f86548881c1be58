import React from 'react';
import { RadarChart, Radar, PolarGrid, PolarAngleAxis, PolarRadiusAxis, Legend } from 'recharts';
import type { RadarRow } from '../../../services/report/chartData';

interface RadarComparisonProps {
  rows: RadarRow[];
  banks: string[];
  colorFor: (bank: string) => string;
  latestYear: number;
}

const RadarComparison: React.FC<RadarComparisonProps> = ({ rows, banks, colorFor, latestYear }) => (
  <figure className="bg-white rounded-xl border border-slate-200 p-4">
    <figcaption className="text-sm font-semibold text-slate-700 mb-2">
      Multi-dimensional performance - {latestYear}
    </figcaption>
    <RadarChart width={600} height={460} data={rows} outerRadius={160}>
      <PolarGrid />
      <PolarAngleAxis dataKey="axis" tick={{ fontSize: 12 }} />
      <PolarRadiusAxis domain={[0, 1]} tick={{ fontSize: 10 }} />
      {banks.map(bank => (
        <Radar
          key={bank}
          name={bank}
          dataKey={(row: RadarRow) => row.values[bank]}
          stroke={colorFor(bank)}
          fill={colorFor(bank)}
          fillOpacity={0.2}
          isAnimationActive={false}
        />
      ))}
      <Legend />
    </RadarChart>
  </figure>
);

export default RadarComparison;
