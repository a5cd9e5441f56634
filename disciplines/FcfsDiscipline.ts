import { DisciplineType, FlowFairnessMode } from '../types';
import type { AdmissionResult, FcfsConfig, Metrics, Packet } from '../types';
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
 * First-Come, First-Served. One line, never reordered; tail-drop when full.
 */
export class FcfsDiscipline implements QueueDiscipline {
    public readonly type = DisciplineType.FCFS;
    public readonly name = 'FCFS';
    public readonly capacity: number | null;
    public currentTime = 0;
    public readonly processedPackets: Packet[] = [];
    public readonly droppedPackets: Packet[] = [];

    private queue: Packet[] = [];

    constructor(config: Omit<FcfsConfig, 'type'> = {}) {
        this.capacity = resolveCapacity(config.capacity);
    }

    public admit(packet: Packet): AdmissionResult {
        if (this.capacity !== null && this.queue.length >= this.capacity) {
            return tailDrop(this, packet);
        }
        this.queue.push(packet);
        return admitted();
    }

    public processNext(): Packet | null {
        const packet = this.queue.shift();
        if (!packet) return null;
        return servicePacket(this, packet);
    }

    public isEmpty(): boolean {
        return this.queue.length === 0;
    }

    public size(): number {
        return this.queue.length;
    }

    public reset() {
        resetLedger(this);
        this.queue = [];
    }

    public getMetrics(mode?: FlowFairnessMode): Metrics {
        return ledgerMetrics(this, mode);
    }

    public getFlowGroups(): Map<number, Packet[]> {
        return ledgerFlowGroups(this);
    }
}
