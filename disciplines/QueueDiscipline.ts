import { DisciplineType, FlowFairnessMode } from '../types';
import type { AdmissionResult, Metrics, Packet } from '../types';
import { calculateMetrics } from '../mathUtils';
import { groupByFlow } from '../packetUtils';

/**
 * Capabilities every queueing discipline offers to the simulator.
 */
export interface QueueDiscipline {
    readonly type: DisciplineType;
    readonly name: string;
    /** Buffer bound in packets, null when unbounded */
    readonly capacity: number | null;
    /** Logical clock, advanced by servicing */
    currentTime: number;
    readonly processedPackets: Packet[];
    readonly droppedPackets: Packet[];

    /** Offer an arriving packet. Drops are reported, never thrown. */
    admit(packet: Packet): AdmissionResult;
    /** Select, service and return the next packet; null when nothing is queued. */
    processNext(): Packet | null;
    isEmpty(): boolean;
    /** Packets currently queued */
    size(): number;
    /** Clear containers, clock and accumulators for a fresh run */
    reset(): void;
    getMetrics(mode?: FlowFairnessMode): Metrics;
    /** Processed packets grouped by flow id */
    getFlowGroups(): Map<number, Packet[]>;
}

/**
 * The part of a discipline's state shared by every variant.
 */
export interface DisciplineLedger {
    currentTime: number;
    readonly processedPackets: Packet[];
    readonly droppedPackets: Packet[];
}

/**
 * Validates an optional buffer bound.
 * Returns null for unbounded; throws RangeError for anything not a non-negative integer.
 */
export const resolveCapacity = (capacity: number | null | undefined): number | null => {
    if (capacity === undefined || capacity === null) return null;
    if (!Number.isInteger(capacity) || capacity < 0) {
        throw new RangeError(`Queue capacity must be a non-negative integer, got ${capacity}`);
    }
    return capacity;
};

/**
 * Runs a packet to completion at the ledger's clock.
 */
export const servicePacket = (ledger: DisciplineLedger, packet: Packet): Packet => {
    if (packet.startTime === undefined) {
        packet.startTime = ledger.currentTime;
    }
    ledger.currentTime += packet.serviceTime;
    packet.finishTime = ledger.currentTime;
    ledger.processedPackets.push(packet);
    return packet;
};

/**
 * Records the incoming packet as dropped and reports it.
 */
export const tailDrop = (ledger: DisciplineLedger, packet: Packet): AdmissionResult => {
    ledger.droppedPackets.push(packet);
    return { admitted: false, dropped: [packet] };
};

export const admitted = (): AdmissionResult => ({ admitted: true, dropped: [] });

/**
 * Clears the shared part of the state in place.
 */
export const resetLedger = (ledger: DisciplineLedger): void => {
    ledger.currentTime = 0;
    ledger.processedPackets.length = 0;
    ledger.droppedPackets.length = 0;
};

export const ledgerMetrics = (ledger: DisciplineLedger, mode?: FlowFairnessMode): Metrics =>
    calculateMetrics(ledger.processedPackets, ledger.droppedPackets, ledger.currentTime, mode);

export const ledgerFlowGroups = (ledger: DisciplineLedger): Map<number, Packet[]> =>
    groupByFlow(ledger.processedPackets);
