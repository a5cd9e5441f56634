import React from 'react';
import type { Metrics } from '../types';
import { formatSeconds } from '../mathUtils';

export type HeadlineMetric = 'avgLatency' | 'throughput' | 'dropRate' | 'flowFairnessIndex';

interface HeadlineSpec {
  label: string;
  icon: string;
  colorClass: string;
  /** Whether a larger value is an improvement */
  higherIsBetter: boolean;
  format: (value: number) => string;
}

const HEADLINES: Record<HeadlineMetric, HeadlineSpec> = {
  avgLatency: {
    label: 'Avg Latency',
    icon: 'fa-solid fa-stopwatch',
    colorClass: 'text-blue-600',
    higherIsBetter: false,
    format: formatSeconds
  },
  throughput: {
    label: 'Throughput',
    icon: 'fa-solid fa-gauge-high',
    colorClass: 'text-emerald-600',
    higherIsBetter: true,
    format: v => `${v.toFixed(3)} pkt/s`
  },
  dropRate: {
    label: 'Drop Rate',
    icon: 'fa-solid fa-ban',
    colorClass: 'text-red-600',
    higherIsBetter: false,
    format: v => `${(v * 100).toFixed(1)} %`
  },
  flowFairnessIndex: {
    label: 'Flow Fairness',
    icon: 'fa-solid fa-scale-balanced',
    colorClass: 'text-purple-600',
    higherIsBetter: true,
    format: v => v.toFixed(4)
  }
};

interface MetricsCardProps {
  metric: HeadlineMetric;
  metrics: Metrics;
  /** Reference discipline the value is compared against */
  baseline?: { name: string; metrics: Metrics };
  subtext?: string;
}

/**
 * Relative change against the baseline, e.g. "-25% vs FCFS".
 * Null when there is nothing meaningful to compare.
 */
export const describeChange = (value: number, reference: number): { text: string; improved: boolean | null } | null => {
  if (!Number.isFinite(value) || !Number.isFinite(reference) || reference === 0) return null;
  const change = (value - reference) / Math.abs(reference);
  const pct = Math.round(change * 100);
  return { text: `${pct > 0 ? '+' : ''}${pct}%`, improved: pct === 0 ? null : change > 0 };
};

/**
 * A single headline statistic of the selected discipline.
 */
const MetricsCard: React.FC<MetricsCardProps> = ({ metric, metrics, baseline, subtext }) => {
  const spec = HEADLINES[metric];
  const value = metrics[metric];
  const change = baseline ? describeChange(value, baseline.metrics[metric]) : null;

  let changeClass = 'text-slate-400';
  if (change && change.improved !== null) {
    changeClass = change.improved === spec.higherIsBetter ? 'text-emerald-600' : 'text-red-600';
  }

  return (
    <div className="bg-white p-4 rounded-xl shadow-sm border border-slate-200 flex flex-col justify-between">
      <div className="flex items-center justify-between mb-2">
        <span className="text-xs font-semibold text-slate-500 uppercase tracking-wider">{spec.label}</span>
        <i className={`${spec.icon} text-slate-400`}></i>
      </div>
      <span className={`text-2xl font-bold font-mono ${spec.colorClass}`}>
        {Number.isFinite(value) ? spec.format(value) : '-'}
      </span>
      {baseline && change && (
        <span className={`text-xs font-bold ${changeClass}`}>{change.text} vs {baseline.name}</span>
      )}
      {subtext && <p className="text-xs text-slate-400 mt-1">{subtext}</p>}
    </div>
  );
};

export default MetricsCard;
