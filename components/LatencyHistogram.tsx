import React, { useMemo } from 'react';
import { BarChart, Bar, XAxis, YAxis, Tooltip, ResponsiveContainer, CartesianGrid } from 'recharts';
import type { Packet } from '../types';
import { generateHistogram } from '../mathUtils';
import { getLatency } from '../packetUtils';

interface LatencyHistogramProps {
  packets: Packet[];
}

const LatencyHistogram: React.FC<LatencyHistogramProps> = ({ packets }) => {
  const histogramData = useMemo(() => {
    const latencies = packets
      .map(getLatency)
      .filter((l): l is number => l !== null);
    return generateHistogram(latencies, 15);
  }, [packets]);

  return (
    <div className="bg-white p-5 rounded-2xl shadow-sm border border-slate-200">
      <h3 className="text-sm font-black uppercase text-slate-700 mb-4">Latency Distribution</h3>
      {histogramData.length === 0 ? (
        <div className="h-56 flex items-center justify-center text-slate-300 text-sm">No packets processed.</div>
      ) : (
        <div className="h-56 w-full">
          <ResponsiveContainer width="100%" height="100%">
            <BarChart data={histogramData}>
              <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
              <XAxis dataKey="label" tick={{fontSize: 9, fill: '#94a3b8'}} axisLine={false} tickLine={false} interval={1} />
              <YAxis tick={{fontSize: 10, fill: '#94a3b8'}} axisLine={false} tickLine={false} width={30} />
              <Tooltip
                cursor={{fill: '#f8fafc'}}
                contentStyle={{borderRadius: '8px', border: 'none', boxShadow: '0 4px 6px -1px rgb(0 0 0 / 0.1)'}}
                itemStyle={{fontSize: '11px', fontWeight: 'bold'}}
              />
              <Bar dataKey="count" name="Packets" fill="#3b82f6" radius={[4, 4, 0, 0]} isAnimationActive={false} />
            </BarChart>
          </ResponsiveContainer>
        </div>
      )}
    </div>
  );
};

export default LatencyHistogram;
