/**
 * Seeded pseudo-random source (mulberry32).
 *
 * Every generator call takes one of these explicitly, so two streams built from
 * the same seed are identical and no state is shared between them.
 */
export class SeededRandom {
    private state: number;

    constructor(public readonly seed: number) {
        if (!Number.isFinite(seed)) {
            throw new RangeError(`Seed must be a finite number, got ${seed}`);
        }
        this.state = Math.floor(seed) >>> 0;
    }

    /** Uniform in [0, 1) */
    public next(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** Uniform in [min, max) */
    public uniform(min: number, max: number): number {
        return min + (max - min) * this.next();
    }

    /** Uniform integer in [min, max], both inclusive */
    public integer(min: number, max: number): number {
        return min + Math.floor(this.next() * (max - min + 1));
    }

    /**
     * Exponential variate with the given rate (mean = 1 / rate).
     * Inverse transform sampling.
     */
    public exponential(rate: number): number {
        return -Math.log(1 - this.next()) / rate;
    }

    /**
     * Picks one value with probability proportional to its weight.
     */
    public weightedChoice<T>(entries: ReadonlyArray<readonly [T, number]>): T {
        const total = entries.reduce((sum, [, weight]) => sum + Math.max(0, weight), 0);
        if (entries.length === 0 || total <= 0) {
            throw new RangeError('weightedChoice needs at least one entry with a positive weight');
        }

        let threshold = this.next() * total;
        for (const [value, weight] of entries) {
            if (weight <= 0) continue;
            threshold -= weight;
            if (threshold < 0) return value;
        }
        // Rounding can leave a sliver past the last bucket
        const last = entries.filter(([, weight]) => weight > 0);
        return last[last.length - 1][0];
    }
}
