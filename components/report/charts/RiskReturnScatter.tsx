import React from 'react';
import {
  ScatterChart,
  Scatter,
  XAxis,
  YAxis,
  CartesianGrid,
  ReferenceLine,
  Legend,
  LabelList,
} from 'recharts';
import type { Metric } from '../../../types';
import type { ScatterPoint } from '../../../services/report/chartData';

interface RiskReturnScatterProps {
  points: Map<string, ScatterPoint[]>;
  colorFor: (bank: string) => string;
  medianLeverage: Metric;
  medianRoe: Metric;
}

const RiskReturnScatter: React.FC<RiskReturnScatterProps> = ({ points, colorFor, medianLeverage, medianRoe }) => (
  <figure className="bg-white rounded-xl border border-slate-200 p-4">
    <figcaption className="text-sm font-semibold text-slate-700 mb-2">
      Risk / return: ROE vs leverage ratio
    </figcaption>
    <ScatterChart width={760} height={460} margin={{ top: 20, right: 30, left: 10, bottom: 20 }}>
      <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
      <XAxis type="number" dataKey="leverage" name="Leverage" domain={['auto', 'auto']} label={{ value: 'Leverage (risk)', position: 'insideBottom', offset: -10 }} />
      <YAxis type="number" dataKey="roe" name="ROE" domain={['auto', 'auto']} label={{ value: 'ROE (return)', angle: -90, position: 'insideLeft' }} />
      {medianLeverage !== null && <ReferenceLine x={medianLeverage} stroke="#94a3b8" strokeDasharray="4 4" />}
      {medianRoe !== null && <ReferenceLine y={medianRoe} stroke="#94a3b8" strokeDasharray="4 4" />}
      <Legend verticalAlign="top" />
      {[...points.entries()].map(([bank, data]) => (
        <Scatter key={bank} name={bank} data={data} fill={colorFor(bank)} isAnimationActive={false}>
          <LabelList dataKey="year" position="top" style={{ fontSize: 10 }} />
        </Scatter>
      ))}
    </ScatterChart>
  </figure>
);

export default RiskReturnScatter;
