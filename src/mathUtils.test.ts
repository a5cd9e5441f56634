import { describe, it, expect } from 'vitest';
import {
  jainIndex,
  calculateMetrics,
  calculateFlowBreakdown,
  generateHistogram,
  formatSeconds,
  generateCSV,
  buildSummaryRows
} from '../mathUtils';
import { DisciplineType, FlowFairnessMode } from '../types';
import type { Packet } from '../types';

const served = (id: number, priority: number, arrival: number, start: number, finish: number): Packet => ({
  id, priority, arrivalTime: arrival, size: 1000, serviceTime: finish - start, startTime: start, finishTime: finish
});

const lost = (id: number, priority: number): Packet => ({
  id, priority, arrivalTime: 0, size: 1000, serviceTime: 1
});

describe('Math Utils', () => {

  describe('jainIndex', () => {
    it('should be 1 for zero or one value', () => {
      expect(jainIndex([])).toBe(1);
      expect(jainIndex([5])).toBe(1);
    });

    it('should be 1 for equal values', () => {
      expect(jainIndex([2, 2, 2, 2])).toBe(1);
    });

    it('should be 0 when every value is 0', () => {
      expect(jainIndex([0, 0, 0])).toBe(0);
    });

    it('should penalise unequal values', () => {
      // (1 + 0)^2 / (2 * 1) = 0.5
      expect(jainIndex([1, 0])).toBeCloseTo(0.5);
      // 36 / (3 * 14)
      expect(jainIndex([1, 2, 3])).toBeCloseTo(36 / 42);
    });
  });

  describe('calculateMetrics', () => {
    // Flow 1: one packet, latency 1. Flow 2: one served (latency 3), one dropped.
    const processed = [served(0, 1, 0, 0, 1), served(1, 2, 0, 1, 3)];
    const dropped = [lost(2, 2)];

    it('should derive latency, throughput and drop rate', () => {
      const m = calculateMetrics(processed, dropped, 3);
      expect(m.avgLatency).toBeCloseTo(2);
      expect(m.avgWaitingTime).toBeCloseTo(0.5);
      expect(m.throughput).toBeCloseTo(2 / 3);
      expect(m.totalPackets).toBe(2);
      expect(m.droppedPackets).toBe(1);
      expect(m.dropRate).toBeCloseTo(1 / 3);
      // latencies [1, 3]: 16 / 20
      expect(m.fairnessIndex).toBeCloseTo(0.8);
    });

    it('should report both per-flow fairness flavours', () => {
      const m = calculateMetrics(processed, dropped, 3);
      expect(m.flowLatencyFairness).toBeCloseTo(0.8);
      // ratios [1, 0.5]: 2.25 / 2.5
      expect(m.flowThroughputFairness).toBeCloseTo(0.9);
    });

    it('should pick the flow fairness flavour by mode', () => {
      expect(calculateMetrics(processed, dropped, 3, FlowFairnessMode.LATENCY).flowFairnessIndex).toBeCloseTo(0.8);
      expect(calculateMetrics(processed, dropped, 3, FlowFairnessMode.THROUGHPUT).flowFairnessIndex).toBeCloseTo(0.9);
      // AUTO uses throughput once something was dropped
      expect(calculateMetrics(processed, dropped, 3, FlowFairnessMode.AUTO).flowFairnessIndex).toBeCloseTo(0.9);
      expect(calculateMetrics(processed, [], 3, FlowFairnessMode.AUTO).flowFairnessIndex).toBeCloseTo(0.8);
    });

    it('should return neutral values for an empty run', () => {
      const m = calculateMetrics([], [], 0);
      expect(m.avgLatency).toBe(0);
      expect(m.throughput).toBe(0);
      expect(m.dropRate).toBe(0);
      expect(m.fairnessIndex).toBe(1);
      expect(m.flowFairnessIndex).toBe(1);
    });
  });

  describe('calculateFlowBreakdown', () => {
    it('should list every offered flow in ascending order', () => {
      const flows = calculateFlowBreakdown([served(0, 3, 0, 0, 2)], [lost(1, 1)]);
      expect(flows.map(f => f.flowId)).toEqual([1, 3]);
      expect(flows[0]).toEqual({
        flowId: 1, offered: 1, processed: 0, dropped: 1, avgLatency: 0, avgWaitingTime: 0, throughputRatio: 0
      });
      expect(flows[1].avgLatency).toBe(2);
      expect(flows[1].throughputRatio).toBe(1);
    });
  });

  describe('generateHistogram', () => {
    it('should place a single distinct value in the first bucket', () => {
      const hist = generateHistogram([2, 2, 2], 4);
      expect(hist.map(b => b.count)).toEqual([3, 0, 0, 0]);
      expect(hist[0].label).toBe('2.0-3.0');
    });

    it('should put the maximum into the last bucket', () => {
      expect(generateHistogram([0, 10], 5).map(b => b.count)).toEqual([1, 0, 0, 0, 1]);
    });

    it('should return no buckets for no data', () => {
      expect(generateHistogram([])).toEqual([]);
    });
  });

  describe('formatSeconds', () => {
    it('should switch units at one second', () => {
      expect(formatSeconds(0.25)).toBe('250 ms');
      expect(formatSeconds(1.5)).toBe('1.50 s');
      expect(formatSeconds(Infinity)).toBe('-');
    });
  });

  describe('CSV export', () => {
    it('should format numbers and quote strings', () => {
      expect(generateCSV([{ a: 1, b: 'x' }], ['a', 'b'])).toBe('a,b\n1.0000,"x"');
      expect(generateCSV([], ['a'])).toBe('');
    });

    it('should build one summary row per discipline', () => {
      const metrics = calculateMetrics([served(0, 1, 0, 0, 1)], [], 1);
      const rows = buildSummaryRows([{
        name: 'FCFS', type: DisciplineType.FCFS, metrics,
        processedPackets: [], droppedPackets: [], flows: [], events: []
      }]);
      expect(rows).toEqual([{
        discipline: 'FCFS',
        processed: 1,
        dropped: 0,
        dropRate: 0,
        avgLatency: 1,
        avgWaitingTime: 0,
        throughput: 1,
        fairnessIndex: 1,
        flowFairnessIndex: 1
      }]);
    });
  });
});
