/**
 * Proposes candidate letter sets for the batch.
 *
 * Only seven-letter signatures that at least one dictionary word spells out
 * exactly (a "pangram shape") are proposed, so every proposal admits a pangram.
 * Shapes are drawn by rejection sampling against the scheduler's letter weights,
 * which steers the batch toward letters it has used least.
 */

import { GenerationError } from '../errors.js';
import type { Letter, LetterSet, SamplingWeights } from '../types/models.js';
import { createLetterSet } from '../utils/letters.js';
import { SeededRandom, type Seed } from '../utils/random.js';
import type { PangramShape, WordIndex } from './word-index.js';

export interface SamplerConfig {
    seed: Seed;
    /** Minimum number of words a shape must carry (default: 1) */
    minPangramWords?: number;
    /** Rejected draws allowed before the last draw is taken as-is (default: 64) */
    maxDrawsPerProposal?: number;
}

const DEFAULT_MAX_DRAWS = 64;

export class LetterSetSampler {
    private readonly shapes: readonly PangramShape[];
    private readonly maxDraws: number;
    private readonly rng: SeededRandom;
    private weights: SamplingWeights = { letters: new Map(), centers: new Map() };

    constructor(index: WordIndex, config: SamplerConfig) {
        this.shapes = index.pangramShapes(config.minPangramWords ?? 1);
        this.maxDraws = Math.max(1, config.maxDrawsPerProposal ?? DEFAULT_MAX_DRAWS);
        this.rng = new SeededRandom(config.seed);
    }

    /**
     * Number of distinct seven-letter sets this sampler can propose.
     */
    get shapeCount(): number {
        return this.shapes.length;
    }

    /**
     * Restart the deterministic proposal sequence.
     */
    reset(seed: Seed): void {
        this.rng.reset(seed);
    }

    /**
     * Replace the letter weights. Letters without an entry weigh 1.
     */
    setWeights(weights: SamplingWeights): void {
        this.weights = weights;
    }

    /**
     * Propose one letter set.
     *
     * @throws GenerationError NO_PANGRAM_SHAPES when the dictionary has no
     * seven-letter word shapes at all
     */
    propose(): LetterSet {
        if (this.shapes.length === 0) {
            throw new GenerationError(
                'NO_PANGRAM_SHAPES',
                'Dictionary contains no words using exactly seven distinct letters'
            );
        }

        let shape = this.drawShape();
        for (let draw = 1; draw < this.maxDraws; draw++) {
            if (this.rng.next() < this.shapeWeight(shape)) break;
            shape = this.drawShape();
        }

        const center = this.rng.pickWeighted(shape.letters, (letter) => this.weightOf(this.weights.centers, letter));
        if (center === undefined) {
            throw new GenerationError('NO_PANGRAM_SHAPES', 'Drew an empty pangram shape');
        }
        return createLetterSet(
            center,
            shape.letters.filter((letter) => letter !== center)
        );
    }

    /**
     * Lazy, unbounded sequence of proposals. Callers bound the iteration.
     */
    *proposals(): Generator<LetterSet, never, undefined> {
        while (true) {
            yield this.propose();
        }
    }

    private drawShape(): PangramShape {
        const shape = this.rng.pick(this.shapes);
        if (!shape) {
            throw new GenerationError('NO_PANGRAM_SHAPES', 'No pangram shapes to sample from');
        }
        return shape;
    }

    private shapeWeight(shape: PangramShape): number {
        let total = 0;
        for (const letter of shape.letters) {
            total += this.weightOf(this.weights.letters, letter);
        }
        return total / shape.letters.length;
    }

    private weightOf(weights: ReadonlyMap<Letter, number>, letter: Letter): number {
        return weights.get(letter) ?? 1;
    }
}
