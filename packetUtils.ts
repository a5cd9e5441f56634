import type { Packet, PacketInit } from './types';

export const DEFAULT_PRIORITY = 1;
export const DEFAULT_SIZE = 1000;
export const DEFAULT_SERVICE_TIME = 1.0;

/**
 * Builds a packet with empty timing fields.
 * Throws RangeError on fields the simulator cannot work with.
 */
export const createPacket = (init: PacketInit): Packet => {
  const packet: Packet = {
    id: init.id,
    arrivalTime: init.arrivalTime,
    priority: init.priority ?? DEFAULT_PRIORITY,
    size: init.size ?? DEFAULT_SIZE,
    serviceTime: init.serviceTime ?? DEFAULT_SERVICE_TIME
  };

  if (!Number.isInteger(packet.id) || packet.id < 0) {
    throw new RangeError(`Packet id must be a non-negative integer, got ${packet.id}`);
  }
  if (!Number.isFinite(packet.arrivalTime) || packet.arrivalTime < 0) {
    throw new RangeError(`Packet ${packet.id}: arrival time must be finite and non-negative, got ${packet.arrivalTime}`);
  }
  if (!Number.isInteger(packet.priority) || packet.priority < 1) {
    throw new RangeError(`Packet ${packet.id}: priority must be a positive integer, got ${packet.priority}`);
  }
  if (!Number.isFinite(packet.size) || packet.size < 0) {
    throw new RangeError(`Packet ${packet.id}: size must be non-negative, got ${packet.size}`);
  }
  if (!Number.isFinite(packet.serviceTime) || packet.serviceTime <= 0) {
    throw new RangeError(`Packet ${packet.id}: service time must be positive, got ${packet.serviceTime}`);
  }

  return packet;
};

/**
 * Copy of a packet with its timing outcome cleared, so several disciplines
 * can be run over the same stream.
 */
export const clonePacket = (packet: Packet): Packet => ({
  id: packet.id,
  arrivalTime: packet.arrivalTime,
  priority: packet.priority,
  size: packet.size,
  serviceTime: packet.serviceTime
});

/** finish - arrival, or null while the packet is unfinished */
export const getLatency = (packet: Packet): number | null => {
  if (packet.finishTime === undefined) return null;
  return packet.finishTime - packet.arrivalTime;
};

/** start - arrival, or null while the packet has not started */
export const getWaitingTime = (packet: Packet): number | null => {
  if (packet.startTime === undefined) return null;
  return packet.startTime - packet.arrivalTime;
};

/**
 * Ordering used by priority selection.
 * Negative when `a` should be served first: higher priority wins, then earlier
 * arrival, then lower id.
 */
export const comparePacketPriority = (a: Packet, b: Packet): number => {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.arrivalTime !== b.arrivalTime) return a.arrivalTime - b.arrivalTime;
  return a.id - b.id;
};

/** The flow a packet belongs to. */
export const flowOf = (packet: Packet): number => packet.priority;

/**
 * Groups packets by flow id, preserving their order inside each flow.
 * Keys are inserted in ascending flow id.
 */
export const groupByFlow = (packets: readonly Packet[]): Map<number, Packet[]> => {
  const unsorted = new Map<number, Packet[]>();
  packets.forEach(p => {
    const flow = flowOf(p);
    const bucket = unsorted.get(flow);
    if (bucket) bucket.push(p);
    else unsorted.set(flow, [p]);
  });

  const grouped = new Map<number, Packet[]>();
  Array.from(unsorted.keys())
    .sort((a, b) => a - b)
    .forEach(flow => {
      const bucket = unsorted.get(flow);
      if (bucket) grouped.set(flow, bucket);
    });
  return grouped;
};

/** Stable sort by arrival time. Returns a new array. */
export const sortByArrival = (packets: readonly Packet[]): Packet[] =>
  [...packets].sort((a, b) => a.arrivalTime - b.arrivalTime);
