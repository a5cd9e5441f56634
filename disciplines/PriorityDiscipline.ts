import { DisciplineType, FlowFairnessMode } from '../types';
import type { AdmissionResult, Metrics, Packet, PriorityConfig } from '../types';
import { comparePacketPriority } from '../packetUtils';
import { PacketHeap } from './PacketHeap';
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
 * Strict priority scheduling.
 *
 * Always serves the highest priority packet, earliest arrival first among equals.
 * Sustained high-priority load starves the lower levels. Waiting packets are
 * never aged or boosted.
 * An optional capacity tail-drops arrivals once the heap is full.
 */
export class PriorityDiscipline implements QueueDiscipline {
    public readonly type = DisciplineType.PRIORITY;
    public readonly name = 'Priority Queue';
    public readonly capacity: number | null;
    public currentTime = 0;
    public readonly processedPackets: Packet[] = [];
    public readonly droppedPackets: Packet[] = [];

    private heap = new PacketHeap(comparePacketPriority);

    constructor(config: Omit<PriorityConfig, 'type'> = {}) {
        this.capacity = resolveCapacity(config.capacity);
    }

    public admit(packet: Packet): AdmissionResult {
        if (this.capacity !== null && this.heap.length >= this.capacity) {
            return tailDrop(this, packet);
        }
        this.heap.push(packet);
        return admitted();
    }

    public processNext(): Packet | null {
        const packet = this.heap.pop();
        if (!packet) return null;
        return servicePacket(this, packet);
    }

    public isEmpty(): boolean {
        return this.heap.length === 0;
    }

    public size(): number {
        return this.heap.length;
    }

    public reset() {
        resetLedger(this);
        this.heap.clear();
    }

    public getMetrics(mode?: FlowFairnessMode): Metrics {
        return ledgerMetrics(this, mode);
    }

    public getFlowGroups(): Map<number, Packet[]> {
        return ledgerFlowGroups(this);
    }
}
