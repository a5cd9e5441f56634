
import { FlowFairnessMode } from './types';
import type { ComparisonResult, Metrics, Packet, FlowStats } from './types';
import { getLatency, getWaitingTime, groupByFlow } from './packetUtils';

/**
 * Mean of a list, 0 for an empty list.
 */
const mean = (values: number[]): number => {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
};

const latenciesOf = (packets: readonly Packet[]): number[] =>
  packets.map(getLatency).filter((v): v is number => v !== null);

const waitingTimesOf = (packets: readonly Packet[]): number[] =>
  packets.map(getWaitingTime).filter((v): v is number => v !== null);

/**
 * Jain's fairness index: (Σx)² / (n · Σx²).
 *
 * 1 means every value is equal. Defined as 1 for zero or one value and as 0 when
 * there are several values and all of them are 0 (nothing to share).
 */
export const jainIndex = (values: number[]): number => {
  const n = values.length;
  if (n <= 1) return 1.0;

  const sum = values.reduce((a, b) => a + b, 0);
  const sumSq = values.reduce((a, b) => a + b * b, 0);
  if (sumSq === 0) return 0;

  const index = (sum * sum) / (n * sumSq);
  // Float rounding can push identical values a hair above 1
  return Math.min(1, Math.max(0, index));
};

/**
 * Per-flow statistics over everything that was offered to a discipline.
 * Flows are listed in ascending flow id.
 */
export const calculateFlowBreakdown = (processed: readonly Packet[], dropped: readonly Packet[]): FlowStats[] => {
  const processedByFlow = groupByFlow(processed);
  const droppedByFlow = groupByFlow(dropped);
  const flowIds = Array.from(new Set([...processedByFlow.keys(), ...droppedByFlow.keys()])).sort((a, b) => a - b);

  return flowIds.map(flowId => {
    const served = processedByFlow.get(flowId) ?? [];
    const lost = droppedByFlow.get(flowId) ?? [];
    const offered = served.length + lost.length;
    return {
      flowId,
      offered,
      processed: served.length,
      dropped: lost.length,
      avgLatency: mean(latenciesOf(served)),
      avgWaitingTime: mean(waitingTimesOf(served)),
      throughputRatio: offered > 0 ? served.length / offered : 0
    };
  });
};

/**
 * METRICS ENGINE
 *
 * Derives the summary of a completed run from the processed and dropped
 * packets and the final value of the logical clock.
 *
 * Per-flow fairness is reported both ways. The latency flavour only sees flows
 * that got service, so a fully starved flow is invisible to it; the throughput
 * flavour counts such a flow as a ratio of 0. `AUTO` therefore switches to the
 * throughput flavour as soon as anything was dropped.
 */
export const calculateMetrics = (
  processed: readonly Packet[],
  dropped: readonly Packet[],
  finalTime: number,
  mode: FlowFairnessMode = FlowFairnessMode.AUTO
): Metrics => {
  const latencies = latenciesOf(processed);
  const offered = processed.length + dropped.length;
  const flows = calculateFlowBreakdown(processed, dropped);

  const flowLatencyFairness = jainIndex(flows.filter(f => f.processed > 0).map(f => f.avgLatency));
  const flowThroughputFairness = jainIndex(flows.map(f => f.throughputRatio));

  let flowFairnessIndex: number;
  switch (mode) {
    case FlowFairnessMode.LATENCY:
      flowFairnessIndex = flowLatencyFairness;
      break;
    case FlowFairnessMode.THROUGHPUT:
      flowFairnessIndex = flowThroughputFairness;
      break;
    case FlowFairnessMode.AUTO:
    default:
      flowFairnessIndex = dropped.length > 0 ? flowThroughputFairness : flowLatencyFairness;
  }

  return {
    avgLatency: mean(latencies),
    avgWaitingTime: mean(waitingTimesOf(processed)),
    throughput: finalTime > 0 ? processed.length / finalTime : 0,
    totalPackets: processed.length,
    droppedPackets: dropped.length,
    dropRate: offered > 0 ? dropped.length / offered : 0,
    fairnessIndex: jainIndex(latencies),
    flowFairnessIndex,
    flowLatencyFairness,
    flowThroughputFairness
  };
};

/**
 * STATISTICAL ANALYSIS HELPERS
 */

export interface DataStats {
  mean: number;
  variance: number;
  stdDev: number;
  cv: number; // Coefficient of Variation
  min: number;
  max: number;
  count: number;
}

export const calculateStats = (data: number[]): DataStats => {
  if (data.length === 0) return { mean: 0, variance: 0, stdDev: 0, cv: 0, min: 0, max: 0, count: 0 };

  const avg = mean(data);
  const variance = data.reduce((a, b) => a + Math.pow(b - avg, 2), 0) / data.length;
  const stdDev = Math.sqrt(variance);

  return {
    mean: avg,
    variance,
    stdDev,
    cv: avg > 0 ? stdDev / avg : 0,
    min: Math.min(...data),
    max: Math.max(...data),
    count: data.length
  };
};

export interface HistogramBucket {
  rangeStart: number;
  rangeEnd: number;
  label: string;
  count: number;
}

export const generateHistogram = (data: number[], buckets: number = 20): HistogramBucket[] => {
  if (data.length === 0) return [];
  const min = Math.min(...data);
  const max = Math.max(...data);
  // A single distinct value still gets one non-empty bucket
  const bucketSize = max > min ? (max - min) / buckets : 1;

  const histogram = Array.from({ length: buckets }, (_, i) => ({
    rangeStart: min + i * bucketSize,
    rangeEnd: min + (i + 1) * bucketSize,
    label: `${(min + i * bucketSize).toFixed(1)}-${(min + (i + 1) * bucketSize).toFixed(1)}`,
    count: 0
  }));

  data.forEach(val => {
    let bucketIndex = Math.floor((val - min) / bucketSize);
    if (bucketIndex >= buckets) bucketIndex = buckets - 1;
    histogram[bucketIndex].count++;
  });

  return histogram;
};

/**
 * Formats a logical duration in seconds for display.
 */
export const formatSeconds = (seconds: number): string => {
  if (!Number.isFinite(seconds)) return '-';
  if (seconds < 1) return `${(seconds * 1000).toFixed(0)} ms`;
  return `${seconds.toFixed(2)} s`;
};

// --- EXPORT UTILITIES ---

export type CsvRow = Record<string, string | number>;

export const downloadCSV = (content: string, filename: string) => {
  const blob = new Blob([content], { type: 'text/csv;charset=utf-8;' });
  const link = document.createElement('a');
  if (link.download !== undefined) {
    const url = URL.createObjectURL(blob);
    link.setAttribute('href', url);
    link.setAttribute('download', filename);
    link.style.visibility = 'hidden';
    document.body.appendChild(link);
    link.click();
    document.body.removeChild(link);
    URL.revokeObjectURL(url);
  }
};

export const generateCSV = (data: CsvRow[], headers: string[]): string => {
  if (data.length === 0) return '';
  const headerRow = headers.join(',') + '\n';
  const rows = data.map(obj => {
    return headers.map(header => {
      const val = obj[header];
      if (val === undefined) return '';
      return typeof val === 'number' ? val.toFixed(4) : `"${val}"`;
    }).join(',');
  }).join('\n');
  return headerRow + rows;
};

/**
 * One summary row per discipline, ready for generateCSV.
 */
export const buildSummaryRows = (results: ComparisonResult[]): CsvRow[] =>
  results.map(r => ({
    discipline: r.name,
    processed: r.metrics.totalPackets,
    dropped: r.metrics.droppedPackets,
    dropRate: r.metrics.dropRate,
    avgLatency: r.metrics.avgLatency,
    avgWaitingTime: r.metrics.avgWaitingTime,
    throughput: r.metrics.throughput,
    fairnessIndex: r.metrics.fairnessIndex,
    flowFairnessIndex: r.metrics.flowFairnessIndex
  }));

/**
 * One row per processed packet of every discipline.
 */
export const buildPacketRows = (results: ComparisonResult[]): CsvRow[] =>
  results.flatMap(r => r.processedPackets.map(p => ({
    discipline: r.name,
    id: p.id,
    flow: p.priority,
    arrivalTime: p.arrivalTime,
    startTime: p.startTime ?? '',
    finishTime: p.finishTime ?? '',
    latency: getLatency(p) ?? ''
  })));
