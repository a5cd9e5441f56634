import { describe, it, expect } from 'vitest';
import {
  createDiscipline,
  FcfsDiscipline,
  PriorityDiscipline,
  RoundRobinDiscipline,
  FairQueueDiscipline,
  LasDiscipline
} from '../disciplines';
import type { QueueDiscipline } from '../disciplines';
import { PacketHeap } from '../disciplines/PacketHeap';
import { createPacket, comparePacketPriority } from '../packetUtils';
import { DisciplineType, FairQueueVariant } from '../types';
import type { Packet } from '../types';

const pkt = (id: number, priority = 1, serviceTime = 1, arrivalTime = 0): Packet =>
  createPacket({ id, arrivalTime, priority, serviceTime });

const drain = (discipline: QueueDiscipline): Packet[] => {
  const served: Packet[] = [];
  let next = discipline.processNext();
  while (next) {
    served.push(next);
    next = discipline.processNext();
  }
  return served;
};

describe('PacketHeap', () => {
  it('should pop in comparator order', () => {
    const heap = new PacketHeap(comparePacketPriority);
    [pkt(0, 1), pkt(1, 5), pkt(2, 3), pkt(3, 5), pkt(4, 2)].forEach(p => heap.push(p));
    expect(heap.peek()?.id).toBe(1);
    const order: number[] = [];
    let top = heap.pop();
    while (top) {
      order.push(top.id);
      top = heap.pop();
    }
    expect(order).toEqual([1, 3, 2, 4, 0]);
    expect(heap.length).toBe(0);
  });
});

describe('FCFS', () => {
  it('should serve in arrival order and advance the clock', () => {
    const fcfs = new FcfsDiscipline();
    [pkt(0), pkt(1), pkt(2)].forEach(p => fcfs.admit(p));
    const served = drain(fcfs);
    expect(served.map(p => p.id)).toEqual([0, 1, 2]);
    expect(served.map(p => p.startTime)).toEqual([0, 1, 2]);
    expect(served.map(p => p.finishTime)).toEqual([1, 2, 3]);
    expect(fcfs.currentTime).toBe(3);
    expect(fcfs.processNext()).toBeNull();
  });

  it('should tail-drop once the buffer is full', () => {
    const fcfs = new FcfsDiscipline({ capacity: 2 });
    const third = pkt(2);
    expect(fcfs.admit(pkt(0))).toEqual({ admitted: true, dropped: [] });
    fcfs.admit(pkt(1));
    expect(fcfs.admit(third)).toEqual({ admitted: false, dropped: [third] });
    expect(fcfs.droppedPackets).toEqual([third]);
    expect(fcfs.size()).toBe(2);
  });

  it('should drop everything with a zero capacity', () => {
    const fcfs = new FcfsDiscipline({ capacity: 0 });
    expect(fcfs.admit(pkt(0)).admitted).toBe(false);
    expect(fcfs.isEmpty()).toBe(true);
  });

  it('should reject invalid capacities', () => {
    expect(() => new FcfsDiscipline({ capacity: -1 })).toThrow(RangeError);
    expect(() => new FcfsDiscipline({ capacity: 2.5 })).toThrow(RangeError);
  });

  it('reset should clear queue, clock and results', () => {
    const fcfs = new FcfsDiscipline({ capacity: 1 });
    fcfs.admit(pkt(0));
    fcfs.admit(pkt(1));
    fcfs.processNext();
    fcfs.reset();
    expect(fcfs.currentTime).toBe(0);
    expect(fcfs.processedPackets).toEqual([]);
    expect(fcfs.droppedPackets).toEqual([]);
    expect(fcfs.isEmpty()).toBe(true);
  });
});

describe('Priority Queue', () => {
  it('should serve the highest priority first, earliest among equals', () => {
    const pq = new PriorityDiscipline();
    [pkt(0, 1), pkt(1, 3), pkt(2, 2), pkt(3, 3)].forEach(p => pq.admit(p));
    expect(drain(pq).map(p => p.id)).toEqual([1, 3, 2, 0]);
  });

  it('should tail-drop the arrival when bounded', () => {
    const pq = new PriorityDiscipline({ capacity: 1 });
    pq.admit(pkt(0, 1));
    const urgent = pkt(1, 9);
    expect(pq.admit(urgent)).toEqual({ admitted: false, dropped: [urgent] });
  });
});

describe('Round-Robin', () => {
  it('should place packets by id and rotate over non-empty lines', () => {
    const rr = new RoundRobinDiscipline({ queueCount: 3, timeQuantum: 1 });
    [pkt(0), pkt(3), pkt(6), pkt(1)].forEach(p => rr.admit(p));
    expect(rr.getQueueLengths()).toEqual([3, 1, 0]);

    expect(rr.processNext()?.id).toBe(0);
    expect(rr.currentQueueIndex).toBe(1);
    expect(drain(rr).map(p => p.id)).toEqual([1, 3, 6]);
  });

  it('should bound the total across lines', () => {
    const rr = new RoundRobinDiscipline({ queueCount: 2, timeQuantum: 1, capacity: 2 });
    rr.admit(pkt(0));
    rr.admit(pkt(1));
    expect(rr.admit(pkt(2)).admitted).toBe(false);
    expect(rr.size()).toBe(2);
  });

  it('should reject invalid parameters', () => {
    expect(() => new RoundRobinDiscipline({ queueCount: 0, timeQuantum: 1 })).toThrow(RangeError);
    expect(() => new RoundRobinDiscipline({ queueCount: 2.5, timeQuantum: 1 })).toThrow(RangeError);
    expect(() => new RoundRobinDiscipline({ queueCount: 2, timeQuantum: 0 })).toThrow(RangeError);
  });
});

describe('Fair Queue', () => {
  it('should alternate between equal flows', () => {
    const fq = new FairQueueDiscipline({ variant: FairQueueVariant.VIRTUAL_FINISH });
    [pkt(0, 1), pkt(1, 2), pkt(2, 1), pkt(3, 2), pkt(4, 1), pkt(5, 2)].forEach(p => fq.admit(p));
    expect(drain(fq).map(p => p.priority)).toEqual([1, 2, 1, 2, 1, 2]);
  });

  it('should share service time, not packet count', () => {
    const fq = new FairQueueDiscipline({ variant: FairQueueVariant.VIRTUAL_FINISH });
    // Flow 1 sends 1s packets, flow 2 sends 2s packets
    [0, 1, 2, 3].forEach(id => fq.admit(pkt(id, 1, 1)));
    [4, 5, 6, 7].forEach(id => fq.admit(pkt(id, 2, 2)));
    expect(drain(fq).map(p => p.priority)).toEqual([1, 2, 1, 1, 2, 1, 2, 2]);
    expect(fq.virtualTime).toBe(8);
  });

  it('should hold each flow to its share of the buffer', () => {
    const fq = new FairQueueDiscipline({ variant: FairQueueVariant.VIRTUAL_FINISH, capacity: 20 });
    expect(fq.perFlowLimit(1)).toBe(20);
    for (let i = 0; i < 90; i++) fq.admit(pkt(i, (i % 3) + 1));

    expect(fq.getFlowQueueLengths()).toEqual(new Map([[1, 6], [2, 6], [3, 6]]));
    expect(fq.droppedPackets).toHaveLength(72);
    expect(fq.perFlowLimit(4)).toBe(5);
  });

  it('should report no per-flow limit when unbounded', () => {
    expect(new FairQueueDiscipline({ variant: FairQueueVariant.VIRTUAL_FINISH }).perFlowLimit(1)).toBeNull();
  });

  it('virtual round-robin should serve the least-served flow', () => {
    const fq = new FairQueueDiscipline({ variant: FairQueueVariant.VIRTUAL_ROUND_ROBIN });
    [pkt(0, 1), pkt(1, 1), pkt(2, 2), pkt(3, 2)].forEach(p => fq.admit(p));
    expect(drain(fq).map(p => p.id)).toEqual([0, 2, 1, 3]);
  });
});

describe('LAS Queue', () => {
  it('should serve the flow with the least attained service', () => {
    const las = new LasDiscipline();
    [pkt(0, 1), pkt(1, 1), pkt(2, 2)].forEach(p => las.admit(p));
    expect(drain(las).map(p => p.id)).toEqual([0, 2, 1]);
    expect(las.attainedService(1)).toBe(2);
    expect(las.attainedService(2)).toBe(1);
    expect(las.attainedService(7)).toBe(0);
  });

  it('should evict the newest packet of the elephant flow when full', () => {
    const las = new LasDiscipline({ capacity: 2 });
    las.admit(pkt(0, 1));
    las.admit(pkt(1, 1));
    las.processNext();
    const victim = pkt(2, 1);
    las.admit(victim);

    const mouse = pkt(3, 2);
    expect(las.admit(mouse)).toEqual({ admitted: true, dropped: [victim] });
    expect(las.droppedPackets).toEqual([victim]);
    expect(las.getFlowQueueLengths()).toEqual(new Map([[1, 1], [2, 1]]));
  });

  it('should drop the arrival when nothing can be evicted', () => {
    const las = new LasDiscipline({ capacity: 0 });
    const packet = pkt(0);
    expect(las.admit(packet)).toEqual({ admitted: false, dropped: [packet] });
  });
});

describe('createDiscipline', () => {
  it('should build each discipline from its config', () => {
    expect(createDiscipline({ type: DisciplineType.FCFS })).toBeInstanceOf(FcfsDiscipline);
    expect(createDiscipline({ type: DisciplineType.PRIORITY })).toBeInstanceOf(PriorityDiscipline);
    expect(createDiscipline({ type: DisciplineType.ROUND_ROBIN, queueCount: 3, timeQuantum: 0.5 })).toBeInstanceOf(RoundRobinDiscipline);
    expect(createDiscipline({ type: DisciplineType.FAIR_QUEUE, variant: FairQueueVariant.VIRTUAL_FINISH })).toBeInstanceOf(FairQueueDiscipline);
    const las = createDiscipline({ type: DisciplineType.LAS, capacity: 5 });
    expect(las).toBeInstanceOf(LasDiscipline);
    expect(las.name).toBe('LAS Queue');
    expect(las.capacity).toBe(5);
  });
});
