import { DisciplineType, FairQueueVariant, FlowFairnessMode } from '../types';
import type { AdmissionResult, FairQueueConfig, Metrics, Packet } from '../types';
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

interface FlowCandidate {
    flowId: number;
    /** Primary key: virtual finish tag or granted service */
    key: number;
    /** Service already committed to the flow */
    progress: number;
}

/**
 * Flow-based Fair Queueing.
 *
 * Packets are classified by flow (priority id) into separate FIFO lines.
 *
 * VIRTUAL_FINISH keeps a global virtual clock V and each flow's last committed
 * finish tag. A packet reaching the head of its line is tagged
 * `max(V, lastFinish) + serviceTime`; the smallest head tag is served next and
 * V moves up to it. The tag stays fixed while the packet waits at the head.
 *
 * VIRTUAL_ROUND_ROBIN only keeps what each flow has been granted so far and
 * serves the least-served flow; flows sending equal packets rotate strictly.
 *
 * Ties go to the flow with less committed service, then to the lowest flow id.
 *
 * With a capacity, admission enforces a fair share of the buffer per flow:
 * `max(1, floor(capacity / activeFlows))`, counting the arriving packet's flow.
 */
export class FairQueueDiscipline implements QueueDiscipline {
    public readonly type = DisciplineType.FAIR_QUEUE;
    public readonly name = 'Fair Queue';
    public readonly capacity: number | null;
    public readonly variant: FairQueueVariant;
    public currentTime = 0;
    public readonly processedPackets: Packet[] = [];
    public readonly droppedPackets: Packet[] = [];

    private flows = new FlowQueues();
    private virtualClock = 0;
    /** VIRTUAL_FINISH: last committed finish tag per flow */
    private lastFinish = new Map<number, number>();
    /** VIRTUAL_FINISH: tag of the packet at the head of each line */
    private headTags = new Map<number, number>();
    /** VIRTUAL_ROUND_ROBIN: total service granted per flow */
    private granted = new Map<number, number>();

    constructor(config: Omit<FairQueueConfig, 'type'>) {
        if (!Object.values(FairQueueVariant).includes(config.variant)) {
            throw new RangeError(`Unknown fair queue variant: ${String(config.variant)}`);
        }
        this.capacity = resolveCapacity(config.capacity);
        this.variant = config.variant;
    }

    /** Global virtual clock (VIRTUAL_FINISH) */
    public get virtualTime(): number {
        return this.virtualClock;
    }

    /** Queue length per active flow, ascending flow id */
    public getFlowQueueLengths(): Map<number, number> {
        return this.flows.lengths();
    }

    /** Buffer share a packet of `flowId` would be held to right now, or null when unbounded */
    public perFlowLimit(flowId: number): number | null {
        if (this.capacity === null) return null;
        const flowCount = this.flows.flowCount + (this.flows.has(flowId) ? 0 : 1);
        return Math.max(1, Math.floor(this.capacity / flowCount));
    }

    public admit(packet: Packet): AdmissionResult {
        const flowId = flowOf(packet);
        const limit = this.perFlowLimit(flowId);
        if (limit !== null && this.flows.lengthOf(flowId) >= limit) {
            return tailDrop(this, packet);
        }

        const becameHead = this.flows.enqueue(packet);
        if (becameHead && this.variant === FairQueueVariant.VIRTUAL_FINISH) {
            this.tagHead(flowId);
        }
        return admitted();
    }

    public processNext(): Packet | null {
        const chosen = this.selectFlow();
        if (!chosen) return null;

        const packet = this.flows.dequeue(chosen.flowId);
        if (!packet) return null;

        if (this.variant === FairQueueVariant.VIRTUAL_FINISH) {
            this.lastFinish.set(chosen.flowId, chosen.key);
            this.virtualClock = Math.max(this.virtualClock, chosen.key);
            this.headTags.delete(chosen.flowId);
            if (this.flows.has(chosen.flowId)) this.tagHead(chosen.flowId);
        } else {
            this.granted.set(chosen.flowId, chosen.progress + packet.serviceTime);
        }

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
        this.virtualClock = 0;
        this.lastFinish.clear();
        this.headTags.clear();
        this.granted.clear();
    }

    public getMetrics(mode?: FlowFairnessMode): Metrics {
        return ledgerMetrics(this, mode);
    }

    public getFlowGroups(): Map<number, Packet[]> {
        return ledgerFlowGroups(this);
    }

    private tagHead(flowId: number) {
        const head = this.flows.head(flowId);
        if (!head) return;
        const start = Math.max(this.virtualClock, this.lastFinish.get(flowId) ?? 0);
        this.headTags.set(flowId, start + head.serviceTime);
    }

    private candidateFor(flowId: number): FlowCandidate {
        if (this.variant === FairQueueVariant.VIRTUAL_FINISH) {
            return {
                flowId,
                key: this.headTags.get(flowId) ?? 0,
                progress: this.lastFinish.get(flowId) ?? 0
            };
        }
        const granted = this.granted.get(flowId) ?? 0;
        return { flowId, key: granted, progress: granted };
    }

    private selectFlow(): FlowCandidate | null {
        let best: FlowCandidate | null = null;
        // activeFlows() is ascending, so keeping the first of equals yields the lowest id
        for (const flowId of this.flows.activeFlows()) {
            const candidate = this.candidateFor(flowId);
            if (
                best === null ||
                candidate.key < best.key ||
                (candidate.key === best.key && candidate.progress < best.progress)
            ) {
                best = candidate;
            }
        }
        return best;
    }
}
