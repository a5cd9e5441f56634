import {
    DisciplineType,
    FlowFairnessMode,
    SimulationEventType
} from './types';
import type {
    ComparisonResult,
    DisciplineConfig,
    ExperimentConfig,
    Metrics,
    Packet,
    SimulationEvent,
    SimulationOptions
} from './types';
import { clonePacket, flowOf, sortByArrival } from './packetUtils';
import { calculateFlowBreakdown } from './mathUtils';
import { createDiscipline, type QueueDiscipline } from './disciplines';

export const DEFAULT_SIMULATION_OPTIONS: SimulationOptions = {
    flowFairnessMode: FlowFairnessMode.AUTO,
    eventLogLimit: 500
};

/**
 * Event-stepping simulator for packet queueing disciplines.
 *
 * Time is logical: the clock lives on the discipline and only moves when a packet
 * is serviced or when the engine skips an idle gap to the next arrival.
 * A run is synchronous and fully determined by the input order and the
 * discipline's tie-break rules.
 */
export class SimulationEngine {
    private options: SimulationOptions;
    private events: SimulationEvent[] = [];
    private nextEventId = 0;

    constructor(options: Partial<SimulationOptions> = {}) {
        this.options = { ...DEFAULT_SIMULATION_OPTIONS, ...options };
        if (!Number.isInteger(this.options.eventLogLimit) || this.options.eventLogLimit < 0) {
            throw new RangeError(`Event log limit must be a non-negative integer, got ${this.options.eventLogLimit}`);
        }
    }

    /**
     * Feeds `packets` through `discipline` until every packet is processed or dropped.
     *
     * The discipline is reset first. Packets are mutated in place (start/finish),
     * so pass clones when the same stream is reused.
     */
    public run(packets: readonly Packet[], discipline: QueueDiscipline): Metrics {
        const sorted = sortByArrival(packets);
        discipline.reset();
        this.events = [];
        this.nextEventId = 0;

        let cursor = 0;
        while (cursor < sorted.length || !discipline.isEmpty()) {
            // 1. Admit everything that has arrived by now
            while (cursor < sorted.length && sorted[cursor].arrivalTime <= discipline.currentTime) {
                this.admit(discipline, sorted[cursor]);
                cursor++;
            }

            // 2. Serve one packet, or 3. skip the idle gap
            if (!discipline.isEmpty()) {
                const served = discipline.processNext();
                if (served) {
                    this.record(SimulationEventType.SERVICE, served.startTime ?? discipline.currentTime, served);
                }
            } else if (cursor < sorted.length) {
                this.record(SimulationEventType.IDLE, discipline.currentTime);
                discipline.currentTime = sorted[cursor].arrivalTime;
            }
        }

        return discipline.getMetrics(this.options.flowFairnessMode);
    }

    /**
     * Events recorded by the last run, oldest first.
     */
    public getEvents(): SimulationEvent[] {
        return [...this.events];
    }

    public getOptions(): SimulationOptions {
        return { ...this.options };
    }

    private admit(discipline: QueueDiscipline, packet: Packet) {
        const time = discipline.currentTime;
        this.record(SimulationEventType.ARRIVAL, packet.arrivalTime, packet);
        const result = discipline.admit(packet);
        result.dropped.forEach(p => this.record(SimulationEventType.DROP, time, p));
    }

    private record(type: SimulationEventType, time: number, packet?: Packet) {
        if (this.options.eventLogLimit === 0) return;
        this.events.push({
            id: this.nextEventId++,
            type,
            time,
            packetId: packet?.id,
            flowId: packet ? flowOf(packet) : undefined
        });
        if (this.events.length > this.options.eventLogLimit) {
            this.events.splice(0, this.events.length - this.options.eventLogLimit);
        }
    }
}

/**
 * Runs every config over its own copy of `packets` and collects the outcomes,
 * in config order.
 */
export const runComparison = (
    packets: readonly Packet[],
    configs: DisciplineConfig[],
    options: Partial<SimulationOptions> = {}
): ComparisonResult[] => {
    return configs.map(config => {
        const discipline = createDiscipline(config);
        const engine = new SimulationEngine(options);
        const metrics = engine.run(packets.map(clonePacket), discipline);

        return {
            name: discipline.name,
            type: discipline.type,
            metrics,
            processedPackets: [...discipline.processedPackets],
            droppedPackets: [...discipline.droppedPackets],
            flows: calculateFlowBreakdown(discipline.processedPackets, discipline.droppedPackets),
            events: engine.getEvents()
        };
    });
};

/**
 * Turns the experiment form into one config per enabled discipline,
 * in the order of the DisciplineType enum.
 */
export const createComparisonConfigs = (experiment: ExperimentConfig): DisciplineConfig[] => {
    const capacity = experiment.capacity;
    return Object.values(DisciplineType)
        .filter(type => experiment.enabledDisciplines.includes(type))
        .map((type): DisciplineConfig => {
            switch (type) {
                case DisciplineType.ROUND_ROBIN:
                    return { type, capacity, queueCount: experiment.roundRobinQueues, timeQuantum: experiment.timeQuantum };
                case DisciplineType.FAIR_QUEUE:
                    return { type, capacity, variant: experiment.fairQueueVariant };
                case DisciplineType.FCFS:
                    return { type, capacity };
                case DisciplineType.PRIORITY:
                    return { type, capacity };
                case DisciplineType.LAS:
                    return { type, capacity };
            }
        });
};
