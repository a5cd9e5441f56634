import React, { useState, useCallback } from 'react';
import { useDropzone } from 'react-dropzone';
import { calculateStats, generateHistogram } from '../mathUtils';
import type { DataStats, HistogramBucket } from '../mathUtils';
import { parsePacketTrace } from '../trafficGenerator';
import type { Packet } from '../types';
import { BarChart, Bar, XAxis, Tooltip, ResponsiveContainer } from 'recharts';

interface TraceUploadProps {
  onTraceLoaded: (packets: Packet[]) => void;
}

interface TraceSummary {
  packets: Packet[];
  skippedRows: number;
  interArrival: DataStats;
  service: DataStats;
  flowCount: number;
  serviceHist: HistogramBucket[];
}

const summarize = (text: string): TraceSummary => {
  const { packets, skippedRows } = parsePacketTrace(text);
  const sorted = [...packets].sort((a, b) => a.arrivalTime - b.arrivalTime);
  const interArrivals: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    interArrivals.push(sorted[i].arrivalTime - sorted[i - 1].arrivalTime);
  }
  const serviceTimes = packets.map(p => p.serviceTime);

  return {
    packets,
    skippedRows,
    interArrival: calculateStats(interArrivals),
    service: calculateStats(serviceTimes),
    flowCount: new Set(packets.map(p => p.priority)).size,
    serviceHist: generateHistogram(serviceTimes)
  };
};

/**
 * Drop zone for packet traces (CSV: "arrival, service[, flow[, size]]").
 */
const TraceUpload: React.FC<TraceUploadProps> = ({ onTraceLoaded }) => {
  const [summary, setSummary] = useState<TraceSummary | null>(null);
  const [readError, setReadError] = useState<string | null>(null);

  const processFile = useCallback((file: File) => {
    const reader = new FileReader();
    reader.onload = (e) => {
      const text = e.target?.result;
      if (typeof text !== 'string') {
        setReadError(`Could not read ${file.name} as text`);
        return;
      }
      setReadError(null);
      setSummary(summarize(text));
    };
    reader.onerror = () => setReadError(`Could not read ${file.name}`);
    reader.readAsText(file);
  }, []);

  const onDrop = useCallback((acceptedFiles: File[]) => {
    if (acceptedFiles.length > 0) {
      processFile(acceptedFiles[0]);
    }
  }, [processFile]);

  const { getRootProps, getInputProps, isDragActive } = useDropzone({
    onDrop,
    accept: { 'text/csv': ['.csv'], 'text/plain': ['.txt', '.log'] },
    multiple: false
  });

  return (
    <div className="bg-white rounded-2xl shadow-sm border border-slate-200 p-6">
      <div className="flex items-center gap-2 mb-4 border-b pb-4">
        <i className="fa-solid fa-file-csv text-purple-600 text-2xl"></i>
        <div>
          <h2 className="text-lg font-bold text-slate-800">Packet Trace</h2>
          <p className="text-xs text-slate-500">Upload a CSV of "arrival, service, flow, size" rows to replay it through every discipline.</p>
        </div>
      </div>

      <div
        {...getRootProps()}
        className={`border-2 border-dashed rounded-xl p-8 flex flex-col items-center justify-center cursor-pointer transition-all ${isDragActive ? 'border-purple-500 bg-purple-50' : 'border-slate-300 hover:border-purple-400 hover:bg-slate-50'}`}
      >
        <input {...getInputProps()} />
        <i className="fa-solid fa-cloud-arrow-up text-2xl text-slate-400 mb-2"></i>
        <p className="text-sm font-bold text-slate-600 text-center">
          {isDragActive ? "Drop file here..." : "Drag & Drop or Click to Upload"}
        </p>
      </div>

      {readError && <p className="mt-3 text-xs text-red-600">{readError}</p>}

      {summary && (
        <div className="mt-4 bg-slate-50 rounded-xl p-4 border border-slate-200">
          <div className="flex justify-between items-center mb-3">
            <span className="text-xs font-bold uppercase text-slate-500">File Summary</span>
            <span className="bg-purple-100 text-purple-700 text-[10px] font-bold px-2 py-1 rounded-full">{summary.packets.length} Packets</span>
          </div>
          <div className="grid grid-cols-3 gap-3 text-sm font-mono text-slate-700">
            <div>
              <span className="block text-[10px] text-slate-400 font-bold uppercase font-sans">Flows</span>
              {summary.flowCount}
            </div>
            <div>
              <span className="block text-[10px] text-slate-400 font-bold uppercase font-sans">Mean Gap</span>
              {summary.interArrival.mean.toFixed(3)}
            </div>
            <div>
              <span className="block text-[10px] text-slate-400 font-bold uppercase font-sans">Service CV</span>
              {summary.service.cv.toFixed(2)}
            </div>
          </div>
          {summary.skippedRows > 0 && (
            <p className="mt-2 text-xs text-amber-600">{summary.skippedRows} rows skipped</p>
          )}
          <div className="h-24 w-full mt-3">
            <ResponsiveContainer width="100%" height="100%">
              <BarChart data={summary.serviceHist}>
                <XAxis dataKey="label" hide />
                <Tooltip />
                <Bar dataKey="count" fill="#10b981" radius={[2, 2, 0, 0]} />
              </BarChart>
            </ResponsiveContainer>
          </div>
          <button
            onClick={() => onTraceLoaded(summary.packets)}
            disabled={summary.packets.length === 0}
            className="w-full mt-4 py-2 bg-purple-600 hover:bg-purple-700 disabled:bg-slate-300 text-white font-bold rounded-lg flex items-center justify-center gap-2"
          >
            <i className="fa-solid fa-play"></i> Run Trace Comparison
          </button>
        </div>
      )}
    </div>
  );
};

export default TraceUpload;
