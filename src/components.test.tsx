import { describe, it, expect, vi } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';
import ResultsTable from '../components/ResultsTable';
import ConfigPanel from '../components/ConfigPanel';
import MetricsCard, { describeChange } from '../components/MetricsCard';
import EventLog from '../components/EventLog';
import { runComparison } from '../SimulationEngine';
import { DEFAULT_EXPERIMENT_CONFIG } from '../hooks/useComparison';
import { createPacket } from '../packetUtils';
import { DisciplineType, SimulationEventType } from '../types';
import type { Metrics } from '../types';

describe('ResultsTable', () => {
  const results = runComparison(
    [createPacket({ id: 0, arrivalTime: 0 }), createPacket({ id: 1, arrivalTime: 0, priority: 2 })],
    [{ type: DisciplineType.FCFS }, { type: DisciplineType.LAS }]
  );

  it('should render one row per discipline', () => {
    render(<ResultsTable results={results} selected={null} onSelect={() => {}} />);
    expect(screen.getByText('FCFS')).toBeInTheDocument();
    expect(screen.getByText('LAS Queue')).toBeInTheDocument();
    expect(screen.getAllByText('0.0%')).toHaveLength(2);
  });

  it('should report the clicked discipline', () => {
    const onSelect = vi.fn();
    render(<ResultsTable results={results} selected="FCFS" onSelect={onSelect} />);
    fireEvent.click(screen.getByText('LAS Queue'));
    expect(onSelect).toHaveBeenCalledWith('LAS Queue');
  });

  it('should say when nothing is selected', () => {
    render(<ResultsTable results={[]} selected={null} onSelect={() => {}} />);
    expect(screen.getByText('No disciplines selected.')).toBeInTheDocument();
  });
});

describe('ConfigPanel', () => {
  it('should toggle a discipline off', () => {
    const onConfigChange = vi.fn();
    render(<ConfigPanel config={DEFAULT_EXPERIMENT_CONFIG} onConfigChange={onConfigChange} onReset={() => {}} />);
    fireEvent.click(screen.getByLabelText('Round-Robin'));
    expect(onConfigChange).toHaveBeenCalledWith({
      enabledDisciplines: [DisciplineType.FCFS, DisciplineType.PRIORITY, DisciplineType.FAIR_QUEUE, DisciplineType.LAS]
    });
  });

  it('should switch to a bounded buffer of 20', () => {
    const onConfigChange = vi.fn();
    render(<ConfigPanel config={DEFAULT_EXPERIMENT_CONFIG} onConfigChange={onConfigChange} onReset={() => {}} />);
    fireEvent.click(screen.getByLabelText('Bounded buffer'));
    expect(onConfigChange).toHaveBeenCalledWith({ capacity: 20 });
  });
});

describe('MetricsCard', () => {
  const metrics = (overrides: Partial<Metrics> = {}): Metrics => ({
    avgLatency: 2,
    avgWaitingTime: 1,
    throughput: 0.5,
    totalPackets: 4,
    droppedPackets: 0,
    dropRate: 0,
    fairnessIndex: 1,
    flowFairnessIndex: 1,
    flowLatencyFairness: 1,
    flowThroughputFairness: 1,
    ...overrides
  });

  it('should format the value for its metric', () => {
    render(<MetricsCard metric="throughput" metrics={metrics()} />);
    expect(screen.getByText('Throughput')).toBeInTheDocument();
    expect(screen.getByText('0.500 pkt/s')).toBeInTheDocument();
    expect(screen.queryByText(/vs/)).toBeNull();
  });

  it('should mark a lower latency than the baseline as an improvement', () => {
    render(
      <MetricsCard
        metric="avgLatency"
        metrics={metrics({ avgLatency: 1.5 })}
        baseline={{ name: 'FCFS', metrics: metrics() }}
      />
    );
    expect(screen.getByText('1.50 s')).toBeInTheDocument();
    expect(screen.getByText('-25% vs FCFS')).toHaveClass('text-emerald-600');
  });

  it('should omit the comparison when the baseline value is zero', () => {
    render(<MetricsCard metric="dropRate" metrics={metrics()} baseline={{ name: 'FCFS', metrics: metrics() }} />);
    expect(screen.getByText('0.0 %')).toBeInTheDocument();
    expect(screen.queryByText(/vs FCFS/)).toBeNull();
  });
});

describe('describeChange', () => {
  it('should report signed whole percentages', () => {
    expect(describeChange(3, 2)).toEqual({ text: '+50%', improved: true });
    expect(describeChange(1.5, 2)).toEqual({ text: '-25%', improved: false });
    expect(describeChange(2, 2)).toEqual({ text: '0%', improved: null });
  });

  it('should return null without a usable reference', () => {
    expect(describeChange(1, 0)).toBeNull();
    expect(describeChange(NaN, 2)).toBeNull();
  });
});

describe('EventLog', () => {
  it('should show the newest events only', () => {
    const events = [
      { id: 0, type: SimulationEventType.ARRIVAL, time: 0, packetId: 0, flowId: 1 },
      { id: 1, type: SimulationEventType.SERVICE, time: 0, packetId: 0, flowId: 1 },
      { id: 2, type: SimulationEventType.DROP, time: 0.5, packetId: 7, flowId: 2 }
    ];
    render(<EventLog events={events} maxRows={2} />);
    expect(screen.getByText('2 of 3')).toBeInTheDocument();
    expect(screen.queryByText('ARRIVAL')).toBeNull();
    expect(screen.getByText('#7')).toBeInTheDocument();
  });
});
