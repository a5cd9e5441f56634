
/**
 * The queueing disciplines the simulator can drive.
 * The set is closed: every variant has its own config shape and implementation.
 */
export enum DisciplineType {
  /** Single FIFO line. Tail-drops when full. */
  FCFS = 'FCFS',
  /** Strict priority heap. Low priorities may starve. */
  PRIORITY = 'Priority Queue',
  /** Fixed set of FIFO lines visited in rotation. */
  ROUND_ROBIN = 'Round-Robin',
  /** Per-flow queues with fair-share buffer limits. */
  FAIR_QUEUE = 'Fair Queue',
  /** Least-Attained-Service with elephant eviction. */
  LAS = 'LAS Queue'
}

/**
 * Bookkeeping used by the Fair Queue discipline to order flows.
 */
export enum FairQueueVariant {
  /** Global virtual clock and per-flow virtual finish tags (approximates bit-by-bit round robin). */
  VIRTUAL_FINISH = 'Virtual Finish Time',
  /** Per-flow granted service totals; always serves the least-served flow. */
  VIRTUAL_ROUND_ROBIN = 'Virtual Round Robin'
}

/**
 * How the per-flow fairness index is derived.
 */
export enum FlowFairnessMode {
  /** Jain's index over each flow's average latency. */
  LATENCY = 'Latency',
  /** Jain's index over each flow's processed / offered ratio. */
  THROUGHPUT = 'Throughput Ratio',
  /** Throughput ratio when packets were dropped, latency otherwise. */
  AUTO = 'Auto'
}

/**
 * Arrival process used by the packet generator.
 */
export enum TrafficModel {
  /** Exponential inter-arrival times. */
  POISSON = 'Poisson',
  /** Groups of packets arriving almost together, groups spaced exponentially. */
  BURSTY = 'Bursty'
}

/**
 * Canned traffic mixes that mimic everyday applications.
 */
export enum TrafficScenario {
  MESSAGE_TEXTING = 'Message Texting',
  VIDEO_STREAMING = 'Video Streaming',
  ONLINE_MEETING = 'Online Meeting',
  FILE_DOWNLOAD = 'File Download',
  MICE_AND_ELEPHANTS = 'Mice & Elephants'
}

/**
 * Where the packet stream of an experiment comes from.
 */
export enum TrafficSource {
  GENERATED = 'Generated',
  SCENARIO = 'Scenario',
  TRACE = 'Trace File'
}

/**
 * Kinds of entries written to the engine's event buffer.
 */
export enum SimulationEventType {
  ARRIVAL = 'ARRIVAL',
  DROP = 'DROP',
  SERVICE = 'SERVICE',
  IDLE = 'IDLE'
}

/**
 * A single packet flowing through the simulated network element.
 */
export interface Packet {
  /** Unique identifier (also used by Round-Robin placement) */
  id: number;
  /** Logical time (seconds) when the packet reaches the queue */
  arrivalTime: number;
  /** Priority level. Higher number = higher priority. Doubles as the flow id. */
  priority: number;
  /** Size in bytes. Informational only. */
  size: number;
  /** Time the discipline needs to fully process the packet */
  serviceTime: number;
  /** Logical time when service began. Set once. */
  startTime?: number;
  /** Logical time when service completed. Set once. */
  finishTime?: number;
}

/**
 * Fields required to build a packet. Timing outcomes start empty.
 */
export type PacketInit = Pick<Packet, 'id' | 'arrivalTime'> & Partial<Pick<Packet, 'priority' | 'size' | 'serviceTime'>>;

/**
 * Outcome of offering a packet to a discipline.
 * `dropped` lists every packet that left the buffer because of this admission:
 * the incoming packet itself (tail-drop) or an evicted queued packet.
 */
export interface AdmissionResult {
  admitted: boolean;
  dropped: Packet[];
}

interface CapacityConfig {
  /** Buffer bound in packets. Omitted or null = unbounded. */
  capacity?: number | null;
}

export interface FcfsConfig extends CapacityConfig {
  type: DisciplineType.FCFS;
}

export interface PriorityConfig extends CapacityConfig {
  type: DisciplineType.PRIORITY;
}

export interface RoundRobinConfig extends CapacityConfig {
  type: DisciplineType.ROUND_ROBIN;
  /** Number of FIFO lines (N). Packets go to line `id mod N`. */
  queueCount: number;
  /** Accepted for reporting; every packet still runs to completion. */
  timeQuantum: number;
}

export interface FairQueueConfig extends CapacityConfig {
  type: DisciplineType.FAIR_QUEUE;
  variant: FairQueueVariant;
}

export interface LasConfig extends CapacityConfig {
  type: DisciplineType.LAS;
}

/**
 * Construction parameters for any discipline, discriminated by `type`.
 */
export type DisciplineConfig = FcfsConfig | PriorityConfig | RoundRobinConfig | FairQueueConfig | LasConfig;

/**
 * Summary of one completed run.
 * All values are finite and non-negative; fairness indices lie in [0, 1].
 */
export interface Metrics {
  /** Mean of finish - arrival over processed packets */
  avgLatency: number;
  /** Mean of start - arrival over processed packets */
  avgWaitingTime: number;
  /** Processed packets per unit of logical time */
  throughput: number;
  /** Number of processed packets */
  totalPackets: number;
  /** Number of dropped packets */
  droppedPackets: number;
  /** dropped / (processed + dropped) */
  dropRate: number;
  /** Jain's index over individual packet latencies */
  fairnessIndex: number;
  /** Per-flow index selected by the fairness mode */
  flowFairnessIndex: number;
  /** Jain's index over per-flow average latency */
  flowLatencyFairness: number;
  /** Jain's index over per-flow processed / offered ratio */
  flowThroughputFairness: number;
}

/**
 * Per-flow statistics used by tables and flow charts.
 */
export interface FlowStats {
  flowId: number;
  offered: number;
  processed: number;
  dropped: number;
  avgLatency: number;
  avgWaitingTime: number;
  /** processed / offered */
  throughputRatio: number;
}

/**
 * Entry in the engine's bounded event buffer.
 */
export interface SimulationEvent {
  id: number;
  type: SimulationEventType;
  time: number;
  packetId?: number;
  flowId?: number;
}

/**
 * Engine settings that do not belong to a discipline.
 */
export interface SimulationOptions {
  flowFairnessMode: FlowFairnessMode;
  /** Most recent events kept in the buffer. 0 disables recording. */
  eventLogLimit: number;
}

/**
 * Result of running one discipline inside a comparison.
 */
export interface ComparisonResult {
  name: string;
  type: DisciplineType;
  metrics: Metrics;
  processedPackets: Packet[];
  droppedPackets: Packet[];
  flows: FlowStats[];
  events: SimulationEvent[];
}

/**
 * Weighted bucket of packet sizes, in bytes (inclusive).
 */
export interface SizeBucket {
  min: number;
  max: number;
  weight: number;
}

/**
 * Parameters of the synthetic packet generator.
 */
export interface GeneratorConfig {
  /** Number of packets to produce */
  count: number;
  /** Mean packets per unit of logical time */
  arrivalRate: number;
  /** Flow id -> relative weight */
  priorityDistribution: Record<number, number>;
  sizeDistribution: SizeBucket[];
  /** [min, max] service time, uniform */
  serviceTimeRange: [number, number];
  trafficModel: TrafficModel;
  /** Packets per burst (BURSTY only) */
  burstSize: number;
}

/**
 * Result of importing a packet trace.
 */
export interface TraceParseResult {
  packets: Packet[];
  /** Non-empty rows that could not be read */
  skippedRows: number;
}

/**
 * Full state of the experiment form in the UI.
 */
export interface ExperimentConfig {
  source: TrafficSource;
  seed: number;
  generator: GeneratorConfig;
  scenario: TrafficScenario;
  /** Buffer bound shared by every discipline. null = unbounded. */
  capacity: number | null;
  enabledDisciplines: DisciplineType[];
  roundRobinQueues: number;
  timeQuantum: number;
  fairQueueVariant: FairQueueVariant;
  flowFairnessMode: FlowFairnessMode;
}
