import React, { useCallback, useState } from 'react';
import { DisciplineType, TrafficSource } from './types';
import type { ExperimentConfig, Packet } from './types';
import { DEFAULT_EXPERIMENT_CONFIG, useComparison } from './hooks/useComparison';
import { buildPacketRows, buildSummaryRows, downloadCSV, generateCSV } from './mathUtils';
import ConfigPanel from './components/ConfigPanel';
import TraceUpload from './components/TraceUpload';
import MetricsCard from './components/MetricsCard';
import ResultsTable from './components/ResultsTable';
import ComparisonChart from './components/ComparisonChart';
import FlowBreakdownChart from './components/FlowBreakdownChart';
import LatencyHistogram from './components/LatencyHistogram';
import EventLog from './components/EventLog';

export const App: React.FC = () => {
  const [config, setConfig] = useState<ExperimentConfig>(DEFAULT_EXPERIMENT_CONFIG);
  const [trace, setTrace] = useState<Packet[] | null>(null);
  const [selectedName, setSelectedName] = useState<string | null>(null);

  const { packets, results, error } = useComparison(config, trace);
  const selected = results.find(r => r.name === selectedName) ?? results[0] ?? null;
  // Headline cards compare against FCFS unless FCFS is the one shown
  const fcfs = results.find(r => r.type === DisciplineType.FCFS);
  const baseline = fcfs && fcfs !== selected ? fcfs : undefined;

  const handleConfigChange = useCallback((updates: Partial<ExperimentConfig>) => {
    setConfig(prev => ({ ...prev, ...updates }));
  }, []);

  const handleReset = useCallback(() => {
    setConfig(DEFAULT_EXPERIMENT_CONFIG);
    setTrace(null);
    setSelectedName(null);
  }, []);

  const handleTraceLoaded = useCallback((loaded: Packet[]) => {
    setTrace(loaded);
    setConfig(prev => ({ ...prev, source: TrafficSource.TRACE }));
  }, []);

  /**
   * Report Export Logic
   */
  const handleExportReport = () => {
    if (results.length === 0) return;
    const ts = new Date().toISOString().slice(0, 19).replace('T', '_');

    const summaryRows = buildSummaryRows(results);
    downloadCSV(generateCSV(summaryRows, Object.keys(summaryRows[0])), `scheduling_summary_${ts}.csv`);

    const packetRows = buildPacketRows(results);
    if (packetRows.length > 0) {
      downloadCSV(generateCSV(packetRows, Object.keys(packetRows[0])), `scheduling_packets_${ts}.csv`);
    }
  };

  return (
    <div className="min-h-screen p-4 md:p-8 max-w-7xl mx-auto">
      {/* Header */}
      <header className="mb-8 flex flex-col md:flex-row md:items-end justify-between gap-4">
        <div>
          <h1 className="text-3xl font-extrabold text-slate-900 tracking-tight flex items-center gap-2">
            <i className="fa-solid fa-network-wired text-blue-600"></i>
            Packet Scheduling Simulator
          </h1>
          <p className="text-slate-500 mt-1">FCFS, Priority, Round-Robin, Fair Queue and LAS on the same traffic</p>
        </div>
        <button
          onClick={handleExportReport}
          disabled={results.length === 0}
          className="px-4 py-2 rounded-lg font-bold text-white bg-emerald-500 hover:bg-emerald-600 disabled:bg-slate-300 transition-all shadow-md flex items-center gap-2"
          title="Download Comparison Data (CSV)"
        >
          <i className="fa-solid fa-file-csv"></i> Export
        </button>
      </header>

      <div className="grid grid-cols-1 lg:grid-cols-4 gap-6">
        <aside className="lg:col-span-1 space-y-6">
          <ConfigPanel config={config} onConfigChange={handleConfigChange} onReset={handleReset} />
          {config.source === TrafficSource.TRACE && <TraceUpload onTraceLoaded={handleTraceLoaded} />}
        </aside>

        <main className="lg:col-span-3 space-y-6">
          {error && (
            <div className="p-4 rounded-xl bg-red-50 border border-red-200 text-sm text-red-700">
              <i className="fa-solid fa-triangle-exclamation mr-2"></i>{error}
            </div>
          )}

          {selected && (
            <div className="grid grid-cols-2 md:grid-cols-4 gap-4">
              <MetricsCard metric="avgLatency" metrics={selected.metrics} baseline={baseline} subtext={selected.name} />
              <MetricsCard metric="throughput" metrics={selected.metrics} baseline={baseline} />
              <MetricsCard metric="dropRate" metrics={selected.metrics} baseline={baseline} subtext={`${selected.metrics.droppedPackets} of ${packets.length} packets`} />
              <MetricsCard metric="flowFairnessIndex" metrics={selected.metrics} baseline={baseline} subtext={config.flowFairnessMode} />
            </div>
          )}

          <div className="bg-white p-5 rounded-2xl shadow-sm border border-slate-200 overflow-x-auto">
            <ResultsTable results={results} selected={selected?.name ?? null} onSelect={setSelectedName} />
          </div>

          <ComparisonChart results={results} />

          {selected && (
            <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
              <FlowBreakdownChart flows={selected.flows} />
              <LatencyHistogram packets={selected.processedPackets} />
            </div>
          )}

          {selected && <EventLog events={selected.events} />}
        </main>
      </div>
    </div>
  );
};
