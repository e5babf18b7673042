/**
 * Decides which evaluated puzzles join the batch.
 *
 * Gates, in order:
 * 1. Hard: the seven-letter set must not appear among the recent live puzzles
 *    passed in, nor anywhere else in this batch. Live dates are assigned only
 *    after the batch is reordered, so any batch member may land on its first day
 *    or next to any other member.
 * 2. Soft: a candidate whose pangram count or center letter is already ahead of
 *    its target share is rejected with a probability that rises with the
 *    overshoot. Consecutive soft rejections relax this gate so a skewed
 *    dictionary slows the batch down instead of starving it.
 *
 * `offer` must be called from a single loop; its tallies are order-sensitive.
 */

import { GenerationError } from '../errors.js';
import type { Letter, PuzzleCandidate, SamplingWeights, ScheduledPuzzle } from '../types/models.js';
import { ALPHABET, letterSetSignature } from '../utils/letters.js';
import { SeededRandom, type Seed } from '../utils/random.js';

export interface SchedulerConfig {
    targetSize: number;
    /** Target share of each pangram count; normalized on construction */
    pangramTargets: ReadonlyMap<number, number>;
    /** Target share of each center letter (default: uniform over the alphabet) */
    centerTargets?: ReadonlyMap<Letter, number>;
    /** Puzzles a pangram bucket may run ahead of target before soft rejection starts */
    pangramSlack?: number;
    /** Same, for center letters */
    centerSlack?: number;
    /** Consecutive soft rejections after which the soft gate is fully relaxed */
    relaxAfter?: number;
    seed: Seed;
    /** Letter-set signatures of live puzzles inside the repeat window; blocked for the whole batch */
    recentSignatures?: readonly number[];
}

export interface SchedulerStats {
    accepted: number;
    targetSize: number;
    pangramHistogram: Record<number, number>;
    centerHistogram: Record<Letter, number>;
    rejected: {
        repeat: number;
        balance: number;
        complete: number;
    };
}

const DEFAULT_PANGRAM_SLACK = 2;
const DEFAULT_CENTER_SLACK = 3;
const DEFAULT_RELAX_AFTER = 200;

function normalizeShares<K>(targets: ReadonlyMap<K, number>, label: string): Map<K, number> {
    let total = 0;
    for (const share of targets.values()) {
        if (!Number.isFinite(share) || share < 0) {
            throw new GenerationError('INVALID_CONFIG', `${label} shares must be non-negative numbers`);
        }
        total += share;
    }
    if (total <= 0) {
        throw new GenerationError('INVALID_CONFIG', `${label} shares must not all be zero`);
    }

    const normalized = new Map<K, number>();
    for (const [key, share] of targets) {
        normalized.set(key, share / total);
    }
    return normalized;
}

/**
 * Probability of rejecting a bucket that is `overshoot` puzzles ahead of target.
 * Zero up to `slack`, then linear up to 1 at twice the slack.
 */
export function overshootProbability(overshoot: number, slack: number): number {
    if (overshoot <= slack) return 0;
    if (slack <= 0) return 1;
    return Math.min(1, (overshoot - slack) / slack);
}

export class DiversityScheduler {
    private readonly targetSize: number;
    private readonly pangramShares: ReadonlyMap<number, number>;
    private readonly centerShares: ReadonlyMap<Letter, number>;
    private readonly pangramSlack: number;
    private readonly centerSlack: number;
    private readonly relaxAfter: number;
    private readonly rng: SeededRandom;

    private readonly history: ReadonlySet<number>;
    private readonly placed = new Set<number>();
    private readonly accepted: ScheduledPuzzle[] = [];
    private readonly pangramCounts = new Map<number, number>();
    private readonly centerCounts = new Map<Letter, number>();
    private readonly letterUsage = new Map<Letter, number>();
    private readonly rejected = { repeat: 0, balance: 0, complete: 0 };
    private consecutiveSoftRejections = 0;

    constructor(config: SchedulerConfig) {
        if (!Number.isInteger(config.targetSize) || config.targetSize < 1) {
            throw new GenerationError('INVALID_CONFIG', 'targetSize must be a positive integer');
        }

        this.targetSize = config.targetSize;
        this.pangramShares = normalizeShares(config.pangramTargets, 'Pangram target');
        this.centerShares = normalizeShares(
            config.centerTargets ?? new Map(ALPHABET.map((letter) => [letter, 1])),
            'Center letter target'
        );
        this.pangramSlack = config.pangramSlack ?? DEFAULT_PANGRAM_SLACK;
        this.centerSlack = config.centerSlack ?? DEFAULT_CENTER_SLACK;
        this.relaxAfter = Math.max(1, config.relaxAfter ?? DEFAULT_RELAX_AFTER);
        this.rng = new SeededRandom(config.seed);

        this.history = new Set(config.recentSignatures ?? []);
    }

    /**
     * Offer a candidate. Returns true when it was added to the batch.
     */
    offer(candidate: PuzzleCandidate): boolean {
        if (this.isComplete()) {
            this.rejected.complete++;
            return false;
        }

        const signature = letterSetSignature(candidate.letterSet);
        if (this.history.has(signature) || this.placed.has(signature)) {
            this.rejected.repeat++;
            return false;
        }

        const relaxation = Math.max(0, 1 - this.consecutiveSoftRejections / this.relaxAfter);
        const rejectProbability = this.balanceRejectProbability(candidate) * relaxation;
        if (rejectProbability > 0 && this.rng.next() < rejectProbability) {
            this.consecutiveSoftRejections++;
            this.rejected.balance++;
            if (this.consecutiveSoftRejections === this.relaxAfter) {
                console.log(
                    `[Scheduler] Balance gate fully relaxed after ${this.relaxAfter} consecutive rejections ` +
                        `at slot ${this.accepted.length + 1} of ${this.targetSize}`
                );
            }
            return false;
        }

        this.accept(candidate, signature);
        return true;
    }

    isComplete(): boolean {
        return this.accepted.length >= this.targetSize;
    }

    /**
     * Accepted puzzles in provisional order.
     */
    batch(): readonly ScheduledPuzzle[] {
        return this.accepted;
    }

    /**
     * Weights for the sampler: letters used more than average are damped.
     */
    samplingWeights(): SamplingWeights {
        return {
            letters: this.dampedWeights(this.letterUsage),
            centers: this.dampedWeights(this.centerCounts),
        };
    }

    stats(): SchedulerStats {
        return {
            accepted: this.accepted.length,
            targetSize: this.targetSize,
            pangramHistogram: Object.fromEntries(this.pangramCounts),
            centerHistogram: Object.fromEntries(this.centerCounts),
            rejected: { ...this.rejected },
        };
    }

    private balanceRejectProbability(candidate: PuzzleCandidate): number {
        const next = this.accepted.length + 1;

        const pangramCount = candidate.pangrams.length;
        const pangramOvershoot =
            (this.pangramCounts.get(pangramCount) ?? 0) + 1 - (this.pangramShares.get(pangramCount) ?? 0) * next;

        const center = candidate.letterSet.center;
        const centerOvershoot =
            (this.centerCounts.get(center) ?? 0) + 1 - (this.centerShares.get(center) ?? 0) * next;

        const pangramReject = overshootProbability(pangramOvershoot, this.pangramSlack);
        const centerReject = overshootProbability(centerOvershoot, this.centerSlack);
        return 1 - (1 - pangramReject) * (1 - centerReject);
    }

    private accept(candidate: PuzzleCandidate, signature: number): void {
        this.accepted.push({ candidate, position: this.accepted.length });
        this.placed.add(signature);
        this.consecutiveSoftRejections = 0;

        const pangramCount = candidate.pangrams.length;
        this.pangramCounts.set(pangramCount, (this.pangramCounts.get(pangramCount) ?? 0) + 1);

        const { center, outer } = candidate.letterSet;
        this.centerCounts.set(center, (this.centerCounts.get(center) ?? 0) + 1);
        for (const letter of [center, ...outer]) {
            this.letterUsage.set(letter, (this.letterUsage.get(letter) ?? 0) + 1);
        }
    }

    private dampedWeights(counts: ReadonlyMap<Letter, number>): Map<Letter, number> {
        let total = 0;
        for (const count of counts.values()) total += count;
        const average = total / ALPHABET.length;

        const weights = new Map<Letter, number>();
        for (const letter of ALPHABET) {
            const excess = Math.max(0, (counts.get(letter) ?? 0) - average);
            weights.set(letter, 1 / (1 + excess / (average + 1)));
        }
        return weights;
    }
}
