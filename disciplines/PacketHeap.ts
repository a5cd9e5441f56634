import type { Packet } from '../types';

/**
 * Binary heap of packets. The packet for which `compare` is smallest sits on top.
 */
export class PacketHeap {
    private heap: Packet[] = [];

    constructor(private readonly compare: (a: Packet, b: Packet) => number) {}

    get length(): number {
        return this.heap.length;
    }

    push(packet: Packet): void {
        this.heap.push(packet);
        this.bubbleUp(this.heap.length - 1);
    }

    /** Remove and return the top packet */
    pop(): Packet | undefined {
        const top = this.heap[0];
        const last = this.heap.pop();
        if (this.heap.length > 0 && last !== undefined) {
            this.heap[0] = last;
            this.sinkDown(0);
        }
        return top;
    }

    peek(): Packet | undefined {
        return this.heap[0];
    }

    clear(): void {
        this.heap = [];
    }

    private bubbleUp(i: number): void {
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (this.compare(this.heap[i], this.heap[parent]) < 0) {
                this.swap(i, parent);
                i = parent;
            } else {
                break;
            }
        }
    }

    private sinkDown(i: number): void {
        const n = this.heap.length;
        while (true) {
            let smallest = i;
            const left = 2 * i + 1;
            const right = 2 * i + 2;
            if (left < n && this.compare(this.heap[left], this.heap[smallest]) < 0) {
                smallest = left;
            }
            if (right < n && this.compare(this.heap[right], this.heap[smallest]) < 0) {
                smallest = right;
            }
            if (smallest !== i) {
                this.swap(i, smallest);
                i = smallest;
            } else {
                break;
            }
        }
    }

    private swap(i: number, j: number): void {
        [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
    }
}
