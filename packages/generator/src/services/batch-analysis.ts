/**
 * Read-only statistics over a list of puzzle records.
 */

import type { Letter, PuzzleRecord } from '../types/models.js';
import { signatureOf } from '../utils/letters.js';
import { positionCorrelation, summarize } from '../utils/statistics.js';

export interface RangeSummary {
    min: number;
    max: number;
    mean: number;
}

export interface BatchAnalysis {
    count: number;
    /** Puzzles per pangram count */
    pangramHistogram: Record<number, number>;
    words: RangeSummary;
    score: RangeSummary;
    bingoCount: number;
    centerLetters: Record<Letter, number>;
    /** Occurrences of each letter across all seven letters of every puzzle */
    letterUsage: Record<Letter, number>;
    /** Pearson r against live-date order */
    correlations: {
        words: number;
        score: number;
        pangrams: number;
    };
    /** Puzzles whose letter set already appeared among the previous `repeatWindow` puzzles */
    repeatViolations: number;
}

function increment<K extends string | number>(counts: Record<K, number>, key: K): void {
    counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Count records that share a seven-letter set with an earlier record
 * no more than `windowSize` positions back in live-date order.
 */
export function countRepeatViolations(sorted: readonly PuzzleRecord[], windowSize: number): number {
    const lastSeen = new Map<number, number>();
    let violations = 0;

    sorted.forEach((record, position) => {
        const signature = signatureOf([record.center_letter, ...record.outside_letters]);
        const previous = lastSeen.get(signature);
        if (previous !== undefined && position - previous <= windowSize) {
            violations++;
        }
        lastSeen.set(signature, position);
    });

    return violations;
}

/**
 * Summarize a batch. Records are ordered by live date first; the input is not modified.
 */
export function analyzeBatch(records: readonly PuzzleRecord[], repeatWindow = 60): BatchAnalysis {
    const sorted = [...records].sort((a, b) => a.live_date.localeCompare(b.live_date));

    const pangramHistogram: Record<number, number> = {};
    const centerLetters: Record<Letter, number> = {};
    const letterUsage: Record<Letter, number> = {};
    let bingoCount = 0;

    for (const record of sorted) {
        increment(pangramHistogram, record.pangrams.length);
        increment(centerLetters, record.center_letter);
        for (const letter of [record.center_letter, ...record.outside_letters]) {
            increment(letterUsage, letter);
        }
        if (record.bingo_possible) bingoCount++;
    }

    const words = sorted.map((record) => record.total_words);
    const scores = sorted.map((record) => record.total_score);
    const pangrams = sorted.map((record) => record.pangrams.length);

    return {
        count: sorted.length,
        pangramHistogram,
        words: summarize(words),
        score: summarize(scores),
        bingoCount,
        centerLetters,
        letterUsage,
        correlations: {
            words: positionCorrelation(words),
            score: positionCorrelation(scores),
            pangrams: positionCorrelation(pangrams),
        },
        repeatViolations: countRepeatViolations(sorted, repeatWindow),
    };
}
