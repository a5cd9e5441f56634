import type { Packet } from '../types';
import { flowOf } from '../packetUtils';

/**
 * One FIFO line per flow. A flow's line exists only while it holds packets.
 */
export class FlowQueues {
    private queues = new Map<number, Packet[]>();
    private total = 0;

    /** Packets queued across every flow */
    get size(): number {
        return this.total;
    }

    /** Flows that currently hold packets */
    get flowCount(): number {
        return this.queues.size;
    }

    has(flowId: number): boolean {
        return this.queues.has(flowId);
    }

    lengthOf(flowId: number): number {
        return this.queues.get(flowId)?.length ?? 0;
    }

    /** Appends the packet to its flow's line. Returns true when the flow was empty. */
    enqueue(packet: Packet): boolean {
        const flowId = flowOf(packet);
        const queue = this.queues.get(flowId);
        this.total++;
        if (queue) {
            queue.push(packet);
            return false;
        }
        this.queues.set(flowId, [packet]);
        return true;
    }

    head(flowId: number): Packet | undefined {
        return this.queues.get(flowId)?.[0];
    }

    /** Removes the head of a flow's line, pruning the line once empty. */
    dequeue(flowId: number): Packet | undefined {
        return this.take(flowId, queue => queue.shift());
    }

    /** Removes the newest packet of a flow's line, pruning the line once empty. */
    popTail(flowId: number): Packet | undefined {
        return this.take(flowId, queue => queue.pop());
    }

    /** Flow ids with queued packets, ascending */
    activeFlows(): number[] {
        return Array.from(this.queues.keys()).sort((a, b) => a - b);
    }

    /** Queue length per active flow, ascending flow id */
    lengths(): Map<number, number> {
        return new Map(this.activeFlows().map(flowId => [flowId, this.lengthOf(flowId)]));
    }

    clear(): void {
        this.queues.clear();
        this.total = 0;
    }

    private take(flowId: number, remove: (queue: Packet[]) => Packet | undefined): Packet | undefined {
        const queue = this.queues.get(flowId);
        if (!queue) return undefined;
        const packet = remove(queue);
        if (packet) this.total--;
        if (queue.length === 0) this.queues.delete(flowId);
        return packet;
    }
}
