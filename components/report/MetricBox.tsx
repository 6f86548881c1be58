import React from 'react';

interface MetricBoxProps {
  label: string;
  value: string;
  accent?: string;
  emphasis?: boolean;
}

const MetricBox: React.FC<MetricBoxProps> = ({ label, value, accent = '#6366f1', emphasis = false }) => (
  <div
    className="metric-box bg-slate-50 rounded-lg p-4 border-l-4"
    style={{ borderLeftColor: accent }}
  >
    <div className="metric-label text-xs uppercase tracking-wide text-slate-500 mb-2">{label}</div>
    <div
      className={`metric-value font-semibold ${emphasis ? 'text-lg' : 'text-2xl text-slate-800'}`}
      style={emphasis ? { color: accent } : undefined}
    >
      {value}
    </div>
  </div>
);

export default MetricBox;
