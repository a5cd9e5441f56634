import React from 'react';
import type { ComparisonResult } from '../types';

interface ResultsTableProps {
  results: ComparisonResult[];
  selected: string | null;
  onSelect: (name: string) => void;
}

/**
 * Side-by-side metrics of every discipline in the comparison.
 * The best value of each column is highlighted.
 */
const ResultsTable: React.FC<ResultsTableProps> = ({ results, selected, onSelect }) => {
  if (results.length === 0) {
    return <p className="text-sm text-slate-400 italic">No disciplines selected.</p>;
  }

  const best = {
    avgLatency: Math.min(...results.map(r => r.metrics.avgLatency)),
    dropRate: Math.min(...results.map(r => r.metrics.dropRate)),
    fairnessIndex: Math.max(...results.map(r => r.metrics.fairnessIndex)),
    flowFairnessIndex: Math.max(...results.map(r => r.metrics.flowFairnessIndex))
  };
  const mark = (isBest: boolean) => isBest ? 'font-bold text-emerald-600' : 'text-slate-700';

  return (
    <table className="w-full text-sm">
      <thead>
        <tr className="text-left text-[10px] uppercase text-slate-400 border-b">
          <th className="py-2">Discipline</th>
          <th>Processed</th>
          <th>Dropped</th>
          <th>Drop Rate</th>
          <th>Avg Latency</th>
          <th>Avg Wait</th>
          <th>Throughput</th>
          <th>Packet Fairness</th>
          <th>Flow Fairness</th>
        </tr>
      </thead>
      <tbody>
        {results.map(r => (
          <tr
            key={r.name}
            onClick={() => onSelect(r.name)}
            className={`border-b cursor-pointer font-mono ${selected === r.name ? 'bg-blue-50' : 'hover:bg-slate-50'}`}
          >
            <td className="py-2 font-sans font-semibold text-slate-800">{r.name}</td>
            <td>{r.metrics.totalPackets}</td>
            <td>{r.metrics.droppedPackets}</td>
            <td className={mark(r.metrics.dropRate === best.dropRate)}>{(r.metrics.dropRate * 100).toFixed(1)}%</td>
            <td className={mark(r.metrics.avgLatency === best.avgLatency)}>{r.metrics.avgLatency.toFixed(3)}</td>
            <td>{r.metrics.avgWaitingTime.toFixed(3)}</td>
            <td>{r.metrics.throughput.toFixed(3)}</td>
            <td className={mark(r.metrics.fairnessIndex === best.fairnessIndex)}>{r.metrics.fairnessIndex.toFixed(4)}</td>
            <td className={mark(r.metrics.flowFairnessIndex === best.flowFairnessIndex)}>{r.metrics.flowFairnessIndex.toFixed(4)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

export default ResultsTable;
