import { DisciplineType, FlowFairnessMode } from '../types';
import type { AdmissionResult, LasConfig, Metrics, Packet } from '../types';
import { flowOf } from '../packetUtils';
import { FlowQueues } from './FlowQueues';
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
 * Least-Attained-Service scheduling.
 *
 * Serves the flow that has received the least service so far, so a new flow
 * (nothing attained yet) goes ahead of every flow already served. Long-running
 * "elephant" flows can starve while short "mice" keep arriving.
 *
 * When the buffer is full, the newest packet of the flow with the most attained
 * service is evicted to make room, instead of dropping the arrival.
 * Ties in both selection and eviction go to the lowest flow id.
 */
export class LasDiscipline implements QueueDiscipline {
    public readonly type = DisciplineType.LAS;
    public readonly name = 'LAS Queue';
    public readonly capacity: number | null;
    public currentTime = 0;
    public readonly processedPackets: Packet[] = [];
    public readonly droppedPackets: Packet[] = [];

    private flows = new FlowQueues();
    private attained = new Map<number, number>();

    constructor(config: Omit<LasConfig, 'type'> = {}) {
        this.capacity = resolveCapacity(config.capacity);
    }

    /** Service received so far by a flow */
    public attainedService(flowId: number): number {
        return this.attained.get(flowId) ?? 0;
    }

    /** Queue length per active flow, ascending flow id */
    public getFlowQueueLengths(): Map<number, number> {
        return this.flows.lengths();
    }

    public admit(packet: Packet): AdmissionResult {
        if (this.capacity !== null && this.flows.size >= this.capacity) {
            const elephant = this.findElephant();
            const evicted = elephant === null ? undefined : this.flows.popTail(elephant);
            if (!evicted) {
                return tailDrop(this, packet);
            }
            this.droppedPackets.push(evicted);
            this.flows.enqueue(packet);
            return { admitted: true, dropped: [evicted] };
        }

        this.flows.enqueue(packet);
        return admitted();
    }

    public processNext(): Packet | null {
        let chosen: number | null = null;
        for (const flowId of this.flows.activeFlows()) {
            if (chosen === null || this.attainedService(flowId) < this.attainedService(chosen)) {
                chosen = flowId;
            }
        }
        if (chosen === null) return null;

        const packet = this.flows.dequeue(chosen);
        if (!packet) return null;
        this.attained.set(flowOf(packet), this.attainedService(chosen) + packet.serviceTime);
        return servicePacket(this, packet);
    }

    public isEmpty(): boolean {
        return this.flows.size === 0;
    }

    public size(): number {
        return this.flows.size;
    }

    public reset() {
        resetLedger(this);
        this.flows.clear();
        this.attained.clear();
    }

    public getMetrics(mode?: FlowFairnessMode): Metrics {
        return ledgerMetrics(this, mode);
    }

    public getFlowGroups(): Map<number, Packet[]> {
        return ledgerFlowGroups(this);
    }

    /** Queued flow with the greatest attained service, or null when nothing is queued */
    private findElephant(): number | null {
        let elephant: number | null = null;
        for (const flowId of this.flows.activeFlows()) {
            if (elephant === null || this.attainedService(flowId) > this.attainedService(elephant)) {
                elephant = flowId;
            }
        }
        return elephant;
    }
}
