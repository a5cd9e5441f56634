import { DisciplineType } from '../types';
import type { DisciplineConfig } from '../types';
import type { QueueDiscipline } from './QueueDiscipline';
import { FcfsDiscipline } from './FcfsDiscipline';
import { PriorityDiscipline } from './PriorityDiscipline';
import { RoundRobinDiscipline } from './RoundRobinDiscipline';
import { FairQueueDiscipline } from './FairQueueDiscipline';
import { LasDiscipline } from './LasDiscipline';

export type { QueueDiscipline } from './QueueDiscipline';
export { FcfsDiscipline, PriorityDiscipline, RoundRobinDiscipline, FairQueueDiscipline, LasDiscipline };

/**
 * Builds a fresh discipline from its config.
 * Invalid parameters throw RangeError here, before any packet is offered.
 */
export const createDiscipline = (config: DisciplineConfig): QueueDiscipline => {
    switch (config.type) {
        case DisciplineType.FCFS:
            return new FcfsDiscipline(config);
        case DisciplineType.PRIORITY:
            return new PriorityDiscipline(config);
        case DisciplineType.ROUND_ROBIN:
            return new RoundRobinDiscipline(config);
        case DisciplineType.FAIR_QUEUE:
            return new FairQueueDiscipline(config);
        case DisciplineType.LAS:
            return new LasDiscipline(config);
        default: {
            const unknown: never = config;
            throw new RangeError(`Unknown discipline: ${JSON.stringify(unknown)}`);
        }
    }
};
