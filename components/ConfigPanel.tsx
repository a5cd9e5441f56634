import React from 'react';
import {
  DisciplineType,
  FairQueueVariant,
  FlowFairnessMode,
  TrafficModel,
  TrafficScenario,
  TrafficSource
} from '../types';
import type { ExperimentConfig, GeneratorConfig } from '../types';
import { SCENARIO_CAPACITY } from '../trafficGenerator';

interface ConfigPanelProps {
  config: ExperimentConfig;
  onConfigChange: (updates: Partial<ExperimentConfig>) => void;
  onReset: () => void;
}

const ConfigPanel: React.FC<ConfigPanelProps> = ({ config, onConfigChange, onReset }) => {
  // Helper to update a single key
  const updateField = <K extends keyof ExperimentConfig>(key: K, value: ExperimentConfig[K]) => {
    const updates: Partial<ExperimentConfig> = {};
    updates[key] = value;
    onConfigChange(updates);
  };

  const updateGenerator = <K extends keyof GeneratorConfig>(key: K, value: GeneratorConfig[K]) => {
    const generator: GeneratorConfig = { ...config.generator };
    generator[key] = value;
    onConfigChange({ generator });
  };

  const toggleDiscipline = (type: DisciplineType) => {
    const enabled = config.enabledDisciplines.includes(type)
      ? config.enabledDisciplines.filter(t => t !== type)
      : [...config.enabledDisciplines, type];
    updateField('enabledDisciplines', enabled);
  };

  // Selecting a scenario also applies its usual buffer size
  const handleScenarioChange = (scenario: TrafficScenario) => {
    onConfigChange({ scenario, capacity: SCENARIO_CAPACITY[scenario] });
  };

  const parseNumber = (raw: string, fallback: number) => {
    const n = parseFloat(raw);
    return isNaN(n) ? fallback : n;
  };

  return (
    <div className="space-y-6">
      <div className="bg-white p-6 rounded-2xl shadow-sm border border-slate-200">
        <h2 className="text-lg font-bold text-slate-800 mb-4 border-b pb-2">Experiment</h2>

        {/* Source Selector */}
        <div className="flex p-1 bg-slate-100 rounded-lg mb-4">
          {Object.values(TrafficSource).map(source => (
            <button
              key={source}
              onClick={() => updateField('source', source)}
              className={`flex-1 py-2 text-[10px] font-bold uppercase rounded-md transition-all ${config.source === source ? 'bg-white text-blue-600 shadow-sm' : 'text-slate-400 hover:text-slate-600'}`}
            >
              {source}
            </button>
          ))}
        </div>

        <div className="space-y-4">
          {config.source !== TrafficSource.TRACE && (
            <label className="block">
              <span className="text-xs font-bold text-slate-500 uppercase">Seed</span>
              <input
                type="number"
                value={config.seed}
                onChange={e => updateField('seed', parseNumber(e.target.value, config.seed))}
                className="mt-1 w-full p-2 border rounded-lg font-mono text-sm"
              />
            </label>
          )}

          {config.source === TrafficSource.SCENARIO && (
            <label className="block">
              <span className="text-xs font-bold text-slate-500 uppercase">Scenario</span>
              <select
                value={config.scenario}
                onChange={e => {
                  const scenario = Object.values(TrafficScenario).find(s => s === e.target.value);
                  if (scenario) handleScenarioChange(scenario);
                }}
                className="mt-1 w-full p-2 border rounded-lg text-sm"
              >
                {Object.values(TrafficScenario).map(s => <option key={s} value={s}>{s}</option>)}
              </select>
            </label>
          )}

          {config.source === TrafficSource.GENERATED && (
            <div className="grid grid-cols-2 gap-3">
              <label className="block">
                <span className="text-xs font-bold text-slate-500 uppercase">Packets</span>
                <input
                  type="number" min={0}
                  value={config.generator.count}
                  onChange={e => updateGenerator('count', Math.max(0, Math.floor(parseNumber(e.target.value, 0))))}
                  className="mt-1 w-full p-2 border rounded-lg font-mono text-sm"
                />
              </label>
              <label className="block">
                <span className="text-xs font-bold text-slate-500 uppercase">Rate (pkt/s)</span>
                <input
                  type="number" min={0.1} step={0.1}
                  value={config.generator.arrivalRate}
                  onChange={e => updateGenerator('arrivalRate', parseNumber(e.target.value, config.generator.arrivalRate))}
                  className="mt-1 w-full p-2 border rounded-lg font-mono text-sm"
                />
              </label>
              <label className="block col-span-2">
                <span className="text-xs font-bold text-slate-500 uppercase">Traffic Model</span>
                <select
                  value={config.generator.trafficModel}
                  onChange={e => {
                    const model = Object.values(TrafficModel).find(m => m === e.target.value);
                    if (model) updateGenerator('trafficModel', model);
                  }}
                  className="mt-1 w-full p-2 border rounded-lg text-sm"
                >
                  {Object.values(TrafficModel).map(m => <option key={m} value={m}>{m}</option>)}
                </select>
              </label>
            </div>
          )}

          {/* Buffer */}
          <div className="p-3 bg-gradient-to-r from-slate-100 to-slate-50 rounded-xl border border-slate-200">
            <div className="flex items-center justify-between">
              <span className="text-xs font-bold text-slate-600 uppercase">Bounded Buffer</span>
              <input
                type="checkbox"
                aria-label="Bounded buffer"
                checked={config.capacity !== null}
                onChange={e => updateField('capacity', e.target.checked ? 20 : null)}
              />
            </div>
            {config.capacity !== null && (
              <input
                type="number" min={0}
                aria-label="Capacity"
                value={config.capacity}
                onChange={e => updateField('capacity', Math.max(0, Math.floor(parseNumber(e.target.value, 0))))}
                className="mt-2 w-full p-2 border rounded-lg font-mono text-sm"
              />
            )}
          </div>
        </div>
      </div>

      <div className="bg-white p-6 rounded-2xl shadow-sm border border-slate-200">
        <h2 className="text-lg font-bold text-slate-800 mb-4 border-b pb-2">Disciplines</h2>
        <div className="space-y-2">
          {Object.values(DisciplineType).map(type => (
            <label key={type} className="flex items-center gap-2 text-sm text-slate-700">
              <input
                type="checkbox"
                checked={config.enabledDisciplines.includes(type)}
                onChange={() => toggleDiscipline(type)}
              />
              {type}
            </label>
          ))}
        </div>

        <div className="grid grid-cols-2 gap-3 mt-4">
          <label className="block">
            <span className="text-xs font-bold text-slate-500 uppercase">RR Queues</span>
            <input
              type="number" min={1}
              value={config.roundRobinQueues}
              onChange={e => updateField('roundRobinQueues', Math.max(1, Math.floor(parseNumber(e.target.value, 1))))}
              className="mt-1 w-full p-2 border rounded-lg font-mono text-sm"
            />
          </label>
          <label className="block">
            <span className="text-xs font-bold text-slate-500 uppercase">Quantum</span>
            <input
              type="number" min={0.1} step={0.1}
              value={config.timeQuantum}
              onChange={e => updateField('timeQuantum', parseNumber(e.target.value, config.timeQuantum))}
              className="mt-1 w-full p-2 border rounded-lg font-mono text-sm"
            />
          </label>
          <label className="block col-span-2">
            <span className="text-xs font-bold text-slate-500 uppercase">Fair Queue Variant</span>
            <select
              value={config.fairQueueVariant}
              onChange={e => {
                const variant = Object.values(FairQueueVariant).find(v => v === e.target.value);
                if (variant) updateField('fairQueueVariant', variant);
              }}
              className="mt-1 w-full p-2 border rounded-lg text-sm"
            >
              {Object.values(FairQueueVariant).map(v => <option key={v} value={v}>{v}</option>)}
            </select>
          </label>
          <label className="block col-span-2">
            <span className="text-xs font-bold text-slate-500 uppercase">Flow Fairness</span>
            <select
              value={config.flowFairnessMode}
              onChange={e => {
                const mode = Object.values(FlowFairnessMode).find(m => m === e.target.value);
                if (mode) updateField('flowFairnessMode', mode);
              }}
              className="mt-1 w-full p-2 border rounded-lg text-sm"
            >
              {Object.values(FlowFairnessMode).map(m => <option key={m} value={m}>{m}</option>)}
            </select>
          </label>
        </div>

        <button
          onClick={onReset}
          className="w-full mt-6 py-2 bg-slate-100 hover:bg-slate-200 text-slate-600 font-bold rounded-lg text-sm"
        >
          <i className="fa-solid fa-rotate-left mr-2"></i>Reset Defaults
        </button>
      </div>
    </div>
  );
};

export default ConfigPanel;
