import { TrafficModel, TrafficScenario } from './types';
import type { GeneratorConfig, Packet, PacketInit, SizeBucket, TraceParseResult } from './types';
import { createPacket, sortByArrival } from './packetUtils';
import type { SeededRandom } from './random';

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
    count: 100,
    arrivalRate: 2.0,
    priorityDistribution: { 1: 0.5, 2: 0.3, 3: 0.2 },
    sizeDistribution: [
        { min: 500, max: 1000, weight: 0.3 },
        { min: 1000, max: 2000, weight: 0.5 },
        { min: 2000, max: 5000, weight: 0.2 }
    ],
    serviceTimeRange: [0.5, 2.0],
    trafficModel: TrafficModel.POISSON,
    burstSize: 10
};

/**
 * Buffer size each scenario is usually run with.
 */
export const SCENARIO_CAPACITY: Record<TrafficScenario, number> = {
    [TrafficScenario.MESSAGE_TEXTING]: 15,
    [TrafficScenario.VIDEO_STREAMING]: 25,
    [TrafficScenario.ONLINE_MEETING]: 30,
    [TrafficScenario.FILE_DOWNLOAD]: 20,
    [TrafficScenario.MICE_AND_ELEPHANTS]: 25
};

/**
 * Checks a generator config. Throws RangeError on the first bad field.
 */
export const validateGeneratorConfig = (config: GeneratorConfig): void => {
    if (!Number.isInteger(config.count) || config.count < 0) {
        throw new RangeError(`Packet count must be a non-negative integer, got ${config.count}`);
    }
    if (!Number.isFinite(config.arrivalRate) || config.arrivalRate <= 0) {
        throw new RangeError(`Arrival rate must be positive, got ${config.arrivalRate}`);
    }
    const [minService, maxService] = config.serviceTimeRange;
    if (!(minService > 0) || !(maxService >= minService)) {
        throw new RangeError(`Service time range must satisfy 0 < min <= max, got [${minService}, ${maxService}]`);
    }
    if (!Number.isInteger(config.burstSize) || config.burstSize < 1) {
        throw new RangeError(`Burst size must be a positive integer, got ${config.burstSize}`);
    }

    const priorities = Object.entries(config.priorityDistribution);
    if (!priorities.some(([, weight]) => weight > 0)) {
        throw new RangeError('Priority distribution needs at least one positive weight');
    }
    priorities.forEach(([flow, weight]) => {
        const flowId = Number(flow);
        if (!Number.isInteger(flowId) || flowId < 1 || weight < 0) {
            throw new RangeError(`Invalid priority distribution entry ${flow}: ${weight}`);
        }
    });

    if (!config.sizeDistribution.some(b => b.weight > 0)) {
        throw new RangeError('Size distribution needs at least one positive weight');
    }
    config.sizeDistribution.forEach(b => {
        if (!(b.min >= 0) || !(b.max >= b.min) || b.weight < 0) {
            throw new RangeError(`Invalid size bucket [${b.min}, ${b.max}] weight ${b.weight}`);
        }
    });
};

/**
 * Synthetic packet source.
 *
 * The random source is owned by the caller and threaded through every draw;
 * ids continue across calls on the same generator.
 */
export class PacketGenerator {
    private packetCounter = 0;

    constructor(private readonly random: SeededRandom) {}

    public generatePackets(overrides: Partial<GeneratorConfig> = {}): Packet[] {
        const config: GeneratorConfig = { ...DEFAULT_GENERATOR_CONFIG, ...overrides };
        validateGeneratorConfig(config);

        const priorities = Object.entries(config.priorityDistribution).map(
            ([flow, weight]): [number, number] => [Number(flow), weight]
        );
        const sizes = config.sizeDistribution.map((b): [SizeBucket, number] => [b, b.weight]);

        const packets: Packet[] = [];
        let currentTime = 0;

        for (let i = 0; i < config.count; i++) {
            currentTime += this.nextGap(config, i);

            const bucket = this.random.weightedChoice(sizes);
            packets.push(createPacket({
                id: this.packetCounter++,
                arrivalTime: currentTime,
                priority: this.random.weightedChoice(priorities),
                size: this.random.integer(bucket.min, bucket.max),
                serviceTime: this.random.uniform(config.serviceTimeRange[0], config.serviceTimeRange[1])
            }));
        }

        return packets;
    }

    /**
     * Time between packet `index - 1` and packet `index`.
     *
     * Bursty traffic keeps the same mean rate: bursts of `burstSize` packets start
     * at rate `arrivalRate / burstSize`, and packets inside a burst follow each
     * other at rate `arrivalRate * burstSize`.
     */
    private nextGap(config: GeneratorConfig, index: number): number {
        if (config.trafficModel === TrafficModel.BURSTY) {
            if (index % config.burstSize === 0) {
                return this.random.exponential(config.arrivalRate / config.burstSize);
            }
            return this.random.exponential(config.arrivalRate * config.burstSize);
        }
        return this.random.exponential(config.arrivalRate);
    }
}

/**
 * Builds the packet mix of a real-world scenario. Flow ids stand for users,
 * streams or downloads. The result is sorted by arrival time.
 */
export const generateScenarioTraffic = (scenario: TrafficScenario, random: SeededRandom): Packet[] => {
    const inits: PacketInit[] = [];
    const add = (arrivalTime: number, priority: number, size: [number, number], service: [number, number]) => {
        inits.push({
            id: inits.length,
            arrivalTime,
            priority,
            size: random.integer(size[0], size[1]),
            serviceTime: random.uniform(service[0], service[1])
        });
    };

    switch (scenario) {
        case TrafficScenario.MESSAGE_TEXTING:
            // 3 users, small messages sent in bursts
            for (let user = 1; user <= 3; user++) {
                const messages = random.integer(5, 15);
                const base = random.uniform(0, 2);
                for (let msg = 0; msg < messages; msg++) {
                    add(base + msg * random.uniform(0.1, 0.5), user, [100, 500], [0.01, 0.05]);
                }
            }
            break;

        case TrafficScenario.VIDEO_STREAMING:
            // HD stream (flow 1) and SD stream (flow 2)
            for (let i = 0; i < 50; i++) add(i * 0.1, 1, [3000, 5000], [0.3, 0.5]);
            for (let i = 0; i < 30; i++) add(i * 0.15 + 0.05, 2, [1000, 2000], [0.1, 0.2]);
            break;

        case TrafficScenario.ONLINE_MEETING:
            // 3 participants, each with audio and video
            for (let participant = 1; participant <= 3; participant++) {
                for (let i = 0; i < 30; i++) add(i * 0.05 + participant * 0.01, participant, [200, 400], [0.02, 0.05]);
                for (let i = 0; i < 15; i++) add(i * 0.2 + participant * 0.02, participant, [1500, 3000], [0.1, 0.2]);
            }
            break;

        case TrafficScenario.FILE_DOWNLOAD:
            // One aggressive download against two small background tasks
            for (let i = 0; i < 60; i++) add(i * 0.05, 1, [4000, 5000], [0.4, 0.6]);
            for (let i = 0; i < 15; i++) add(i * 0.3 + 0.1, 2, [500, 1000], [0.05, 0.1]);
            for (let i = 0; i < 10; i++) add(i * 0.4 + 0.2, 3, [500, 1000], [0.05, 0.1]);
            break;

        case TrafficScenario.MICE_AND_ELEPHANTS:
            // Two continuous downloads plus ten short web requests
            for (let i = 0; i < 40; i++) add(i * 0.08, 1, [4000, 5000], [0.4, 0.6]);
            for (let i = 0; i < 35; i++) add(i * 0.09 + 0.5, 2, [4000, 5000], [0.4, 0.6]);
            for (let mouse = 3; mouse <= 12; mouse++) {
                const count = random.integer(2, 4);
                const start = random.uniform(0.2, 2.5);
                for (let i = 0; i < count; i++) add(start + i * 0.02, mouse, [200, 500], [0.02, 0.05]);
            }
            break;
    }

    return sortByArrival(inits.map(createPacket));
};

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Plain decimal field, NaN for anything else (blank, hex, trailing text) */
const readDecimal = (field: string | undefined): number => {
    if (field === undefined || !DECIMAL.test(field)) return NaN;
    return parseFloat(field);
};

/** Optional column: absent or blank means the default */
const readOptional = (field: string | undefined): number | undefined =>
    field === undefined || field === '' ? undefined : readDecimal(field);

/**
 * Reads a packet trace: one packet per line as
 * `arrivalTime,serviceTime[,flow[,size]]`. A non-numeric first line is taken
 * as a header. Rows that do not describe a valid packet are counted and skipped.
 */
export const parsePacketTrace = (text: string): TraceParseResult => {
    const lines = text.split(/\r?\n/).filter(l => l.trim().length > 0);
    if (lines.length === 0) return { packets: [], skippedRows: 0 };

    const startIdx = isNaN(parseFloat(lines[0].split(',')[0])) ? 1 : 0;
    const packets: Packet[] = [];
    let skippedRows = 0;

    for (let i = startIdx; i < lines.length; i++) {
        const parts = lines[i].split(',').map(p => p.trim());
        const arrivalTime = readDecimal(parts[0]);
        const serviceTime = readDecimal(parts[1]);
        if (isNaN(arrivalTime) || isNaN(serviceTime)) {
            skippedRows++;
            continue;
        }
        try {
            packets.push(createPacket({
                id: packets.length,
                arrivalTime,
                serviceTime,
                priority: readOptional(parts[2]),
                size: readOptional(parts[3])
            }));
        } catch (error) {
            if (!(error instanceof RangeError)) throw error;
            skippedRows++;
        }
    }

    return { packets, skippedRows };
};
