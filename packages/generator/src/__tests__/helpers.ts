/**
 * Shared fixtures for the generator suites.
 */

import type { LetterSet, PuzzleCandidate, PuzzleRecord } from '../types/models.js';
import { ALPHABET, createLetterSet } from '../utils/letters.js';
import { SeededRandom, type Seed } from '../utils/random.js';

export interface SyntheticDictionary {
    words: string[];
    /** Sorted seven-letter sets, in creation order */
    sets: string[][];
}

export function combinations<T>(items: readonly T[], size: number): T[][] {
    if (size === 0) return [[]];
    const result: T[][] = [];
    items.forEach((item, i) => {
        for (const rest of combinations(items.slice(i + 1), size - 1)) {
            result.push([item, ...rest]);
        }
    });
    return result;
}

/**
 * Dictionary of `setCount` distinct seven-letter sets. For each set it holds
 * every 4- and 5-letter subset (letters in alphabetical order) plus
 * 1 + (i % 6) pangrams, so with any center a set admits exactly
 * 35 + pangrams words, scores 95 + 18 * pangrams and never allows a bingo.
 */
export function buildSyntheticDictionary(setCount: number, seed: Seed): SyntheticDictionary {
    const rng = new SeededRandom(seed);
    const seen = new Set<string>();
    const sets: string[][] = [];
    const words: string[] = [];

    while (sets.length < setCount) {
        const letters = rng.shuffle(ALPHABET).slice(0, 7).sort();
        const key = letters.join('');
        if (seen.has(key)) continue;
        seen.add(key);

        const pangramCount = 1 + (sets.length % 6);
        sets.push(letters);

        letters.slice(0, pangramCount).forEach((extra) => words.push(key + extra));
        for (const subset of combinations(letters, 4)) words.push(subset.join(''));
        for (const subset of combinations(letters, 5)) words.push(subset.join(''));
    }

    return { words, sets };
}

export function letterSetFrom(letters: readonly string[], center: string): LetterSet {
    return createLetterSet(
        center,
        letters.filter((letter) => letter !== center)
    );
}

export function makeCandidate(overrides: Partial<PuzzleCandidate> & { letterSet: LetterSet }): PuzzleCandidate {
    return {
        validWords: [],
        pangrams: ['placeholder'],
        bingoPossible: false,
        totalScore: 0,
        totalWords: 0,
        ...overrides,
    };
}

export function makeRecord(overrides: Partial<PuzzleRecord> = {}): PuzzleRecord {
    return {
        id: 'abcd1234',
        last_reviewed: '2025-01-01 00:00:00',
        live_date: '2025-01-01',
        center_letter: 'i',
        outside_letters: ['a', 'e', 'n', 'o', 'r', 't'],
        pangrams: ['orientation'],
        bingo_possible: false,
        total_score: 40,
        total_words: 30,
        valid_words: [],
        ...overrides,
    };
}

/**
 * Run `fn` and return what it threw.
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}
