import React, { useMemo, useState } from 'react';
import { BarChart, Bar, XAxis, YAxis, Tooltip, ResponsiveContainer, CartesianGrid } from 'recharts';
import type { ComparisonResult, Metrics } from '../types';

type ChartMetric = keyof Pick<Metrics, 'avgLatency' | 'avgWaitingTime' | 'throughput' | 'dropRate' | 'fairnessIndex' | 'flowFairnessIndex'>;

const METRIC_LABELS: Record<ChartMetric, string> = {
  avgLatency: 'Avg Latency',
  avgWaitingTime: 'Avg Wait',
  throughput: 'Throughput',
  dropRate: 'Drop Rate',
  fairnessIndex: 'Packet Fairness',
  flowFairnessIndex: 'Flow Fairness'
};

const METRICS: ChartMetric[] = ['avgLatency', 'avgWaitingTime', 'throughput', 'dropRate', 'fairnessIndex', 'flowFairnessIndex'];

interface ComparisonChartProps {
  results: ComparisonResult[];
}

/**
 * One bar per discipline for the chosen metric.
 */
const ComparisonChart: React.FC<ComparisonChartProps> = ({ results }) => {
  const [metric, setMetric] = useState<ChartMetric>('avgLatency');

  const chartData = useMemo(
    () => results.map(r => ({ name: r.name, value: r.metrics[metric] })),
    [results, metric]
  );

  return (
    <div className="bg-white p-5 rounded-2xl shadow-sm border border-slate-200">
      <div className="flex items-center justify-between mb-4">
        <h3 className="text-sm font-black uppercase text-slate-700">Discipline Comparison</h3>
        <div className="flex gap-1">
          {METRICS.map(m => (
            <button
              key={m}
              onClick={() => setMetric(m)}
              className={`px-2 py-1 text-[10px] font-bold uppercase rounded ${metric === m ? 'bg-blue-600 text-white' : 'bg-slate-100 text-slate-500 hover:bg-slate-200'}`}
            >
              {METRIC_LABELS[m]}
            </button>
          ))}
        </div>
      </div>
      <div className="h-64 w-full">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={chartData}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
            <XAxis dataKey="name" tick={{fontSize: 10, fill: '#94a3b8'}} axisLine={false} tickLine={false} />
            <YAxis tick={{fontSize: 10, fill: '#94a3b8'}} axisLine={false} tickLine={false} width={40} />
            <Tooltip
              cursor={{fill: '#f8fafc'}}
              contentStyle={{borderRadius: '8px', border: 'none', boxShadow: '0 4px 6px -1px rgb(0 0 0 / 0.1)'}}
              itemStyle={{fontSize: '11px', fontWeight: 'bold'}}
            />
            <Bar dataKey="value" name={METRIC_LABELS[metric]} fill="#3b82f6" radius={[4, 4, 0, 0]} isAnimationActive={false} />
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default ComparisonChart;
