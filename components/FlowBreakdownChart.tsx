import React from 'react';
import { BarChart, Bar, XAxis, YAxis, Tooltip, ResponsiveContainer, CartesianGrid, Legend } from 'recharts';
import type { FlowStats } from '../types';

interface FlowBreakdownChartProps {
  flows: FlowStats[];
}

/**
 * Processed and dropped packets per flow, with per-flow latency in the table below.
 */
const FlowBreakdownChart: React.FC<FlowBreakdownChartProps> = ({ flows }) => {
  const chartData = flows.map(f => ({ flow: `Flow ${f.flowId}`, processed: f.processed, dropped: f.dropped }));

  return (
    <div className="bg-white p-5 rounded-2xl shadow-sm border border-slate-200">
      <h3 className="text-sm font-black uppercase text-slate-700 mb-4">Per-Flow Breakdown</h3>
      <div className="h-56 w-full">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={chartData}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
            <XAxis dataKey="flow" tick={{fontSize: 10, fill: '#94a3b8'}} axisLine={false} tickLine={false} />
            <YAxis tick={{fontSize: 10, fill: '#94a3b8'}} axisLine={false} tickLine={false} width={30} />
            <Tooltip
              contentStyle={{borderRadius: '8px', border: 'none', boxShadow: '0 4px 6px -1px rgb(0 0 0 / 0.1)'}}
              itemStyle={{fontSize: '11px', fontWeight: 'bold'}}
            />
            <Legend wrapperStyle={{fontSize: '10px', paddingTop: '10px'}} />
            <Bar dataKey="processed" stackId="a" fill="#10b981" name="Processed" isAnimationActive={false} />
            <Bar dataKey="dropped" stackId="a" fill="#ef4444" name="Dropped" radius={[2, 2, 0, 0]} isAnimationActive={false} />
          </BarChart>
        </ResponsiveContainer>
      </div>
      <table className="w-full text-xs mt-4 font-mono">
        <thead>
          <tr className="text-left text-[10px] uppercase text-slate-400 border-b font-sans">
            <th className="py-1">Flow</th>
            <th>Offered</th>
            <th>Served</th>
            <th>Avg Latency</th>
          </tr>
        </thead>
        <tbody>
          {flows.map(f => (
            <tr key={f.flowId} className="border-b text-slate-700">
              <td className="py-1">{f.flowId}</td>
              <td>{f.offered}</td>
              <td>{(f.throughputRatio * 100).toFixed(1)}%</td>
              <td>{f.processed > 0 ? f.avgLatency.toFixed(3) : '-'}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};

export default FlowBreakdownChart;
