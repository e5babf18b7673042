/**
 * Reorders a finished batch so difficulty does not trend with the live date.
 *
 * Runs up to `trials` seeded shuffles and scores each by the largest absolute
 * Pearson correlation between position and any signal. The first shuffle within
 * the target wins; otherwise the best one found is kept and flagged.
 */

import { SeededRandom, type Seed } from '../utils/random.js';
import { positionCorrelation } from '../utils/statistics.js';

export interface RandomizerConfig {
    seed: Seed;
    /** Maximum number of shuffles to try (default: 200) */
    trials?: number;
    /** Largest acceptable |r| for every signal (default: 0.15) */
    correlationTarget?: number;
}

/**
 * A named numeric property of an item, e.g. its word count.
 */
export type Signal<T> = (item: T) => number;

export interface RandomizedOrder<T> {
    items: T[];
    /** Correlation with position, per signal name, for the returned order */
    correlations: Record<string, number>;
    /** max |r| over all signals */
    worstCorrelation: number;
    metTarget: boolean;
    trialsUsed: number;
    warning?: string;
}

const DEFAULT_TRIALS = 200;
const DEFAULT_CORRELATION_TARGET = 0.15;

export class TemporalRandomizer<T> {
    private readonly rng: SeededRandom;
    private readonly trials: number;
    private readonly target: number;

    constructor(
        private readonly signals: Readonly<Record<string, Signal<T>>>,
        config: RandomizerConfig
    ) {
        this.rng = new SeededRandom(config.seed);
        this.trials = Math.max(1, config.trials ?? DEFAULT_TRIALS);
        this.target = config.correlationTarget ?? DEFAULT_CORRELATION_TARGET;
    }

    /**
     * Return a permutation of `items`; the input array and its items are untouched.
     */
    reorder(items: readonly T[]): RandomizedOrder<T> {
        let best: T[] = [...items];
        let bestCorrelations = this.measure(best);
        let bestScore = Infinity;
        let trialsUsed = 0;

        for (let trial = 0; trial < this.trials; trial++) {
            trialsUsed++;
            const candidate = this.rng.shuffle(items);
            const correlations = this.measure(candidate);
            const score = worstOf(correlations);

            if (score < bestScore) {
                best = candidate;
                bestCorrelations = correlations;
                bestScore = score;
            }
            if (score <= this.target) break;
        }

        const worstCorrelation = worstOf(bestCorrelations);
        const metTarget = worstCorrelation <= this.target;
        const result: RandomizedOrder<T> = {
            items: best,
            correlations: bestCorrelations,
            worstCorrelation,
            metTarget,
            trialsUsed,
        };

        if (!metTarget) {
            result.warning =
                `No ordering within |r| <= ${this.target} after ${trialsUsed} trials; ` +
                `using best found (|r| = ${worstCorrelation.toFixed(3)})`;
            console.warn(`[Randomizer] ${result.warning}`);
        }

        return result;
    }

    private measure(order: readonly T[]): Record<string, number> {
        const correlations: Record<string, number> = {};
        for (const [name, signal] of Object.entries(this.signals)) {
            correlations[name] = positionCorrelation(order.map(signal));
        }
        return correlations;
    }
}

function worstOf(correlations: Record<string, number>): number {
    let worst = 0;
    for (const value of Object.values(correlations)) {
        worst = Math.max(worst, Math.abs(value));
    }
    return worst;
}
