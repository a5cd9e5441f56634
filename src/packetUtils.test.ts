import { describe, it, expect } from 'vitest';
import {
  createPacket,
  clonePacket,
  comparePacketPriority,
  getLatency,
  getWaitingTime,
  groupByFlow,
  sortByArrival
} from '../packetUtils';

describe('Packet Utils', () => {

  describe('createPacket', () => {
    it('should fill in defaults', () => {
      expect(createPacket({ id: 0, arrivalTime: 1.5 })).toEqual({
        id: 0, arrivalTime: 1.5, priority: 1, size: 1000, serviceTime: 1
      });
    });

    it('should reject fields the simulator cannot use', () => {
      expect(() => createPacket({ id: -1, arrivalTime: 0 })).toThrow(RangeError);
      expect(() => createPacket({ id: 1.5, arrivalTime: 0 })).toThrow(RangeError);
      expect(() => createPacket({ id: 0, arrivalTime: -1 })).toThrow(RangeError);
      expect(() => createPacket({ id: 0, arrivalTime: NaN })).toThrow(RangeError);
      expect(() => createPacket({ id: 0, arrivalTime: 0, priority: 0 })).toThrow(RangeError);
      expect(() => createPacket({ id: 0, arrivalTime: 0, size: -5 })).toThrow(RangeError);
      expect(() => createPacket({ id: 0, arrivalTime: 0, serviceTime: 0 })).toThrow(RangeError);
    });
  });

  it('clonePacket should drop the timing outcome', () => {
    const packet = createPacket({ id: 3, arrivalTime: 1, priority: 2 });
    packet.startTime = 2;
    packet.finishTime = 3;
    const copy = clonePacket(packet);
    expect(copy).toEqual({ id: 3, arrivalTime: 1, priority: 2, size: 1000, serviceTime: 1 });
    expect(copy).not.toBe(packet);
  });

  it('should measure latency and waiting time once timed', () => {
    const packet = createPacket({ id: 0, arrivalTime: 1 });
    expect(getLatency(packet)).toBeNull();
    expect(getWaitingTime(packet)).toBeNull();
    packet.startTime = 1.5;
    packet.finishTime = 2.5;
    expect(getWaitingTime(packet)).toBeCloseTo(0.5);
    expect(getLatency(packet)).toBeCloseTo(1.5);
  });

  it('comparePacketPriority should order by priority, then arrival, then id', () => {
    const packets = [
      createPacket({ id: 0, arrivalTime: 0, priority: 1 }),
      createPacket({ id: 1, arrivalTime: 2, priority: 3 }),
      createPacket({ id: 2, arrivalTime: 1, priority: 3 }),
      createPacket({ id: 3, arrivalTime: 1, priority: 3 })
    ];
    expect([...packets].sort(comparePacketPriority).map(p => p.id)).toEqual([2, 3, 1, 0]);
  });

  it('groupByFlow should key flows in ascending order and keep packet order', () => {
    const groups = groupByFlow([
      createPacket({ id: 0, arrivalTime: 0, priority: 3 }),
      createPacket({ id: 1, arrivalTime: 0, priority: 1 }),
      createPacket({ id: 2, arrivalTime: 0, priority: 3 })
    ]);
    expect(Array.from(groups.keys())).toEqual([1, 3]);
    expect(groups.get(3)?.map(p => p.id)).toEqual([0, 2]);
  });

  it('sortByArrival should be stable and leave the input alone', () => {
    const input = [
      createPacket({ id: 0, arrivalTime: 2 }),
      createPacket({ id: 1, arrivalTime: 1 }),
      createPacket({ id: 2, arrivalTime: 1 })
    ];
    expect(sortByArrival(input).map(p => p.id)).toEqual([1, 2, 0]);
    expect(input.map(p => p.id)).toEqual([0, 1, 2]);
  });
});
