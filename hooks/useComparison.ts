import { useMemo } from 'react';
import {
    DisciplineType,
    FairQueueVariant,
    FlowFairnessMode,
    TrafficScenario,
    TrafficSource
} from '../types';
import type { ComparisonResult, ExperimentConfig, Packet } from '../types';
import { SeededRandom } from '../random';
import { DEFAULT_GENERATOR_CONFIG, PacketGenerator, generateScenarioTraffic } from '../trafficGenerator';
import { createComparisonConfigs, runComparison } from '../SimulationEngine';

export const DEFAULT_EXPERIMENT_CONFIG: ExperimentConfig = {
    source: TrafficSource.GENERATED,
    seed: 42,
    generator: DEFAULT_GENERATOR_CONFIG,
    scenario: TrafficScenario.MICE_AND_ELEPHANTS,
    capacity: null,
    enabledDisciplines: Object.values(DisciplineType),
    roundRobinQueues: 3,
    timeQuantum: 0.5,
    fairQueueVariant: FairQueueVariant.VIRTUAL_FINISH,
    flowFairnessMode: FlowFairnessMode.AUTO
};

/**
 * Produces the packet stream an experiment runs on.
 * TRACE falls back to an empty stream until a trace is loaded.
 */
export const buildPacketStream = (experiment: ExperimentConfig, trace: Packet[] | null): Packet[] => {
    switch (experiment.source) {
        case TrafficSource.TRACE:
            return trace ?? [];
        case TrafficSource.SCENARIO:
            return generateScenarioTraffic(experiment.scenario, new SeededRandom(experiment.seed));
        case TrafficSource.GENERATED:
        default:
            return new PacketGenerator(new SeededRandom(experiment.seed)).generatePackets(experiment.generator);
    }
};

interface UseComparisonReturn {
    packets: Packet[];
    results: ComparisonResult[];
    /** Message of the RangeError raised by an invalid configuration, if any */
    error: string | null;
}

/**
 * Runs every enabled discipline over the experiment's packet stream.
 * Recomputes only when the config or the loaded trace changes.
 */
export const useComparison = (experiment: ExperimentConfig, trace: Packet[] | null): UseComparisonReturn => {
    return useMemo(() => {
        try {
            const packets = buildPacketStream(experiment, trace);
            const results = runComparison(packets, createComparisonConfigs(experiment), {
                flowFairnessMode: experiment.flowFairnessMode
            });
            return { packets, results, error: null };
        } catch (err) {
            if (err instanceof RangeError) {
                return { packets: [], results: [], error: err.message };
            }
            throw err;
        }
    }, [experiment, trace]);
};
