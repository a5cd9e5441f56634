import React from 'react';
import { SimulationEventType } from '../types';
import type { SimulationEvent } from '../types';

interface EventLogProps {
  events: SimulationEvent[];
  /** Rows shown, newest last */
  maxRows?: number;
}

const EVENT_STYLES: Record<SimulationEventType, string> = {
  [SimulationEventType.ARRIVAL]: 'text-blue-600',
  [SimulationEventType.DROP]: 'text-red-600',
  [SimulationEventType.SERVICE]: 'text-emerald-600',
  [SimulationEventType.IDLE]: 'text-slate-400'
};

/**
 * Tail of the engine's event buffer for the selected discipline.
 */
const EventLog: React.FC<EventLogProps> = ({ events, maxRows = 50 }) => {
  const visible = events.slice(-maxRows);

  return (
    <div className="bg-white p-5 rounded-2xl shadow-sm border border-slate-200">
      <div className="flex items-center justify-between mb-3">
        <h3 className="text-sm font-black uppercase text-slate-700">Event Log</h3>
        <span className="text-[10px] text-slate-400">{visible.length} of {events.length}</span>
      </div>
      <ul className="max-h-64 overflow-y-auto font-mono text-xs space-y-1">
        {visible.map(e => (
          <li key={e.id} className="flex gap-3">
            <span className="w-16 text-right text-slate-400">{e.time.toFixed(3)}</span>
            <span className={`w-16 font-bold ${EVENT_STYLES[e.type]}`}>{e.type}</span>
            {e.packetId !== undefined && <span>#{e.packetId}</span>}
            {e.flowId !== undefined && <span className="text-slate-500">flow {e.flowId}</span>}
          </li>
        ))}
      </ul>
    </div>
  );
};

export default EventLog;
