/**
 * Tests for batch reordering against difficulty trends.
 */

import { describe, it, expect } from 'vitest';
import { TemporalRandomizer } from '../services/temporal-randomizer.js';

interface Item {
    id: number;
    words: number;
    score: number;
}

// Difficulty rises steadily with position: the worst case for a live schedule
const trending: Item[] = Array.from({ length: 120 }, (_, i) => ({ id: i, words: 25 + i, score: 60 + 2 * i }));

const signals = {
    words: (item: Item) => item.words,
    score: (item: Item) => item.score,
};

describe('TemporalRandomizer', () => {
    it('should break the correlation between position and difficulty', () => {
        const randomizer = new TemporalRandomizer(signals, { seed: 'order' });
        const order = randomizer.reorder(trending);

        expect(order.metTarget).toBe(true);
        expect(order.warning).toBeUndefined();
        expect(Math.abs(order.correlations['words'] ?? 1)).toBeLessThanOrEqual(0.15);
        expect(Math.abs(order.correlations['score'] ?? 1)).toBeLessThanOrEqual(0.15);
        expect(order.worstCorrelation).toBeLessThanOrEqual(0.15);
    });

    it('should return a permutation and leave the input untouched', () => {
        const input = trending.slice();
        const order = new TemporalRandomizer(signals, { seed: 'order' }).reorder(input);

        expect(input).toEqual(trending);
        expect(order.items).toHaveLength(trending.length);
        expect(order.items.map((item) => item.id).sort((a, b) => a - b)).toEqual(trending.map((item) => item.id));
    });

    it('should be deterministic for a seed', () => {
        const first = new TemporalRandomizer(signals, { seed: 7 }).reorder(trending);
        const second = new TemporalRandomizer(signals, { seed: 7 }).reorder(trending);

        expect(second.items.map((item) => item.id)).toEqual(first.items.map((item) => item.id));
    });

    it('should keep the best order and warn when the target cannot be met', () => {
        // two items always correlate perfectly one way or the other
        const pair: Item[] = [
            { id: 0, words: 30, score: 50 },
            { id: 1, words: 40, score: 70 },
        ];
        const order = new TemporalRandomizer(signals, { seed: 1, trials: 5 }).reorder(pair);

        expect(order.metTarget).toBe(false);
        expect(order.trialsUsed).toBe(5);
        expect(order.worstCorrelation).toBeCloseTo(1, 10);
        expect(order.warning).toBe(
            'No ordering within |r| <= 0.15 after 5 trials; using best found (|r| = 1.000)'
        );
    });

    it('should accept an empty batch', () => {
        const order = new TemporalRandomizer(signals, { seed: 1 }).reorder([]);

        expect(order.items).toEqual([]);
        expect(order.metTarget).toBe(true);
        expect(order.trialsUsed).toBe(1);
    });
});
