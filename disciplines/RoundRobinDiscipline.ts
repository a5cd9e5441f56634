import { DisciplineType, FlowFairnessMode } from '../types';
import type { AdmissionResult, Metrics, Packet, RoundRobinConfig } from '../types';
import {
    type QueueDiscipline,
    admitted,
    ledgerFlowGroups,
    ledgerMetrics,
    resetLedger,
    resolveCapacity,
    servicePacket,
    tailDrop
} from './QueueDiscipline';

/**
 * Round-Robin over a fixed set of FIFO lines.
 *
 * Placement is `packet.id mod queueCount`, not flow based. Each selected packet
 * is served to completion; `timeQuantum` is kept for reporting only.
 */
export class RoundRobinDiscipline implements QueueDiscipline {
    public readonly type = DisciplineType.ROUND_ROBIN;
    public readonly name = 'Round-Robin';
    public readonly capacity: number | null;
    public readonly queueCount: number;
    public readonly timeQuantum: number;
    public currentTime = 0;
    public readonly processedPackets: Packet[] = [];
    public readonly droppedPackets: Packet[] = [];

    private queues: Packet[][];
    private pointer = 0;
    private queued = 0;

    constructor(config: Omit<RoundRobinConfig, 'type'>) {
        if (!Number.isInteger(config.queueCount) || config.queueCount < 1) {
            throw new RangeError(`Round-Robin queue count must be a positive integer, got ${config.queueCount}`);
        }
        if (!Number.isFinite(config.timeQuantum) || config.timeQuantum <= 0) {
            throw new RangeError(`Round-Robin time quantum must be positive, got ${config.timeQuantum}`);
        }
        this.capacity = resolveCapacity(config.capacity);
        this.queueCount = config.queueCount;
        this.timeQuantum = config.timeQuantum;
        this.queues = Array.from({ length: this.queueCount }, () => []);
    }

    /** Index of the line currently at the front of the rotation */
    public get currentQueueIndex(): number {
        return this.pointer;
    }

    /** Packets waiting in each line, in line order */
    public getQueueLengths(): number[] {
        return this.queues.map(q => q.length);
    }

    public admit(packet: Packet): AdmissionResult {
        if (this.capacity !== null && this.queued >= this.capacity) {
            return tailDrop(this, packet);
        }
        this.queues[packet.id % this.queueCount].push(packet);
        this.queued++;
        return admitted();
    }

    public processNext(): Packet | null {
        for (let step = 0; step < this.queueCount; step++) {
            const index = (this.pointer + step) % this.queueCount;
            const packet = this.queues[index].shift();
            if (packet) {
                this.queued--;
                // Next turn starts after the line just served
                this.pointer = (index + 1) % this.queueCount;
                return servicePacket(this, packet);
            }
        }
        return null;
    }

    public isEmpty(): boolean {
        return this.queued === 0;
    }

    public size(): number {
        return this.queued;
    }

    public reset() {
        resetLedger(this);
        this.queues = Array.from({ length: this.queueCount }, () => []);
        this.pointer = 0;
        this.queued = 0;
    }

    public getMetrics(mode?: FlowFairnessMode): Metrics {
        return ledgerMetrics(this, mode);
    }

    public getFlowGroups(): Map<number, Packet[]> {
        return ledgerFlowGroups(this);
    }
}
