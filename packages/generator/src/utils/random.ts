/**
 * Seeded random number generator for reproducible batch generation.
 * Uses the seedrandom library for reproducible randomness.
 */

import seedrandom from 'seedrandom';

export type Seed = number | string;

/**
 * Derive an independent sub-seed for one stage of the pipeline.
 *
 * @example
 * deriveSeed(42, 'sampler') // "42:sampler"
 */
export function deriveSeed(seed: Seed, stage: string): string {
    return `${seed}:${stage}`;
}

export class SeededRandom {
    private rng: seedrandom.PRNG;

    constructor(seed?: Seed) {
        this.rng = seedrandom(seed?.toString() ?? Date.now().toString());
    }

    /**
     * Restart the sequence from a new seed.
     */
    reset(seed: Seed): void {
        this.rng = seedrandom(seed.toString());
    }

    /**
     * Get a random number between 0 (inclusive) and 1 (exclusive).
     */
    next(): number {
        return this.rng();
    }

    /**
     * Get a random integer between min (inclusive) and max (exclusive).
     */
    nextInt(min: number, max: number): number {
        return Math.floor(this.next() * (max - min)) + min;
    }

    /**
     * Return a shuffled copy using the Fisher-Yates algorithm.
     */
    shuffle<T>(array: readonly T[]): T[] {
        const result = [...array];
        for (let i = result.length - 1; i > 0; i--) {
            const j = this.nextInt(0, i + 1);
            const temp = result[i];
            const swapVal = result[j];
            if (temp !== undefined && swapVal !== undefined) {
                result[i] = swapVal;
                result[j] = temp;
            }
        }
        return result;
    }

    /**
     * Pick a random element from an array.
     */
    pick<T>(array: readonly T[]): T | undefined {
        if (array.length === 0) return undefined;
        return array[this.nextInt(0, array.length)];
    }

    /**
     * Pick an element with probability proportional to its weight.
     * Falls back to a uniform pick when every weight is zero.
     */
    pickWeighted<T>(array: readonly T[], weightOf: (item: T) => number): T | undefined {
        if (array.length === 0) return undefined;

        const weights = array.map((item) => Math.max(0, weightOf(item)));
        const total = weights.reduce((sum, w) => sum + w, 0);
        if (total <= 0) {
            return this.pick(array);
        }

        let threshold = this.next() * total;
        for (let i = 0; i < array.length; i++) {
            threshold -= weights[i] ?? 0;
            if (threshold < 0) {
                return array[i];
            }
        }
        return array[array.length - 1];
    }
}
