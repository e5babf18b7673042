/**
 * Tests for the batch generation pipeline.
 */

import { describe, it, expect } from 'vitest';
import { parseGeneratorConfig, type GeneratorConfigInput } from '../config/generator-config.js';
import { analyzeBatch, countRepeatViolations } from '../services/batch-analysis.js';
import { generateBatch, latestLiveDate, nextFreeLiveDate, recentSignatures } from '../services/batch-generator.js';
import { WordIndex } from '../services/word-index.js';
import type { PuzzleRecord } from '../types/models.js';
import { addDays } from '../utils/dates.js';
import { signatureOf } from '../utils/letters.js';
import { buildSyntheticDictionary, captureError, makeRecord } from './helpers.js';

const GENERATED_AT = new Date(Date.UTC(2025, 2, 1, 12, 0, 0));
const FIRST_LIVE_DATE = '2025-03-02';
const UNIFORM_TARGETS = { '1': 1, '2': 1, '3': 1, '4': 1, '5': 1, '6': 1 };

const config = (overrides: GeneratorConfigInput = {}) =>
    parseGeneratorConfig({ pangramTargets: UNIFORM_TARGETS, attemptsPerSlot: 2000, ...overrides });

const recordSignature = (record: PuzzleRecord): number =>
    signatureOf([record.center_letter, ...record.outside_letters]);

describe('generateBatch', () => {
    const { words, sets } = buildSyntheticDictionary(40, 'pipeline');
    const index = WordIndex.build(words);

    it('should only emit puzzles that satisfy every rule', () => {
        const result = generateBatch(index, config({ batchSize: 20 }), {
            seed: 'rules',
            firstLiveDate: FIRST_LIVE_DATE,
            generatedAt: GENERATED_AT,
        });

        expect(result.records).toHaveLength(20);
        result.records.forEach((record, i) => {
            const letters = new Set([record.center_letter, ...record.outside_letters]);
            const pangramCount = record.pangrams.length;

            expect(letters.size).toBe(7);
            expect(record.live_date).toBe(addDays(FIRST_LIVE_DATE, i));
            expect(record.last_reviewed).toBe('2025-03-01 12:00:00');
            expect(record.total_words).toBe(record.valid_words.length);
            expect(record.total_words).toBeGreaterThanOrEqual(25);
            expect(record.total_words).toBeLessThanOrEqual(200);
            expect(pangramCount).toBeGreaterThanOrEqual(1);
            expect(pangramCount).toBeLessThanOrEqual(6);

            // fixture arithmetic: 35 subset words plus the pangrams
            expect(record.total_words).toBe(35 + pangramCount);
            expect(record.total_score).toBe(95 + 18 * pangramCount);
            expect(record.bingo_possible).toBe(false);

            for (const word of record.valid_words) {
                expect(word.length).toBeGreaterThanOrEqual(4);
                expect(word).toContain(record.center_letter);
                expect([...word].every((letter) => letters.has(letter))).toBe(true);
            }
            for (const pangram of record.pangrams) {
                expect(new Set(pangram).size).toBe(7);
                expect(record.valid_words).toContain(pangram);
            }
        });

        const signatures = result.records.map(recordSignature);
        expect(new Set(signatures).size).toBe(20);
        expect(new Set(result.records.map((r) => r.id)).size).toBe(20);
    });

    it('should account for every proposal', () => {
        const result = generateBatch(index, config({ batchSize: 20 }), {
            seed: 'tally',
            firstLiveDate: FIRST_LIVE_DATE,
            generatedAt: GENERATED_AT,
        });
        const { proposals, evaluatorRejections, scheduler } = result.stats;
        const evaluatorTotal = Object.values(evaluatorRejections).reduce((sum, n) => sum + n, 0);

        expect(scheduler.accepted).toBe(20);
        expect(proposals).toBe(
            scheduler.accepted + evaluatorTotal + scheduler.rejected.repeat + scheduler.rejected.balance
        );
    });

    it('should produce the same batch for the same seed and generation time', () => {
        const options = { seed: 42, firstLiveDate: FIRST_LIVE_DATE, generatedAt: GENERATED_AT };
        const first = generateBatch(index, config({ batchSize: 15 }), options);
        const second = generateBatch(index, config({ batchSize: 15 }), options);

        expect(second.records).toEqual(first.records);
        expect(second.stats).toEqual(first.stats);
    });

    it('should take the seed from config when none is given', () => {
        const fromConfig = generateBatch(index, config({ batchSize: 10, seed: 'configured' }), {
            firstLiveDate: FIRST_LIVE_DATE,
            generatedAt: GENERATED_AT,
        });
        const explicit = generateBatch(index, config({ batchSize: 10 }), {
            seed: 'configured',
            firstLiveDate: FIRST_LIVE_DATE,
            generatedAt: GENERATED_AT,
        });

        expect(fromConfig.seed).toBe('configured');
        expect(fromConfig.records).toEqual(explicit.records);
    });

    it('should not reuse letter sets from the live history window', () => {
        const history = sets.slice(0, 10).map((letters, i) => {
            const [center = 'a', ...outside] = letters;
            return makeRecord({
                id: `hist000${i}`,
                live_date: addDays(FIRST_LIVE_DATE, -(i + 1)),
                center_letter: center,
                outside_letters: outside,
            });
        });
        const blocked = new Set(history.map(recordSignature));

        const result = generateBatch(index, config({ batchSize: 25 }), {
            seed: 'history',
            firstLiveDate: FIRST_LIVE_DATE,
            generatedAt: GENERATED_AT,
            history,
        });

        expect(result.stats.historyInWindow).toBe(10);
        for (const record of result.records) {
            expect(blocked.has(recordSignature(record))).toBe(false);
            expect(record.id.startsWith('hist')).toBe(false);
        }
    });

    it('should order a large batch so difficulty does not trend with live date', () => {
        const large = buildSyntheticDictionary(150, 'large');
        const result = generateBatch(WordIndex.build(large.words), config({ batchSize: 100 }), {
            seed: 'trend',
            firstLiveDate: FIRST_LIVE_DATE,
            generatedAt: GENERATED_AT,
        });
        const analysis = analyzeBatch(result.records);

        expect(result.records).toHaveLength(100);
        expect(result.stats.metCorrelationTarget).toBe(true);
        expect(result.warnings).toEqual([]);
        expect(Math.abs(analysis.correlations.words)).toBeLessThanOrEqual(0.15);
        expect(Math.abs(analysis.correlations.score)).toBeLessThanOrEqual(0.15);
        expect(Math.abs(analysis.correlations.pangrams)).toBeLessThanOrEqual(0.15);
        expect(analysis.repeatViolations).toBe(0);
    });

    it('should fail with rejection tallies when a slot runs out of attempts', () => {
        const small = buildSyntheticDictionary(3, 'small');
        const error = captureError(() =>
            generateBatch(WordIndex.build(small.words), config({ batchSize: 5, attemptsPerSlot: 50 }), {
                seed: 'exhaust',
                firstLiveDate: FIRST_LIVE_DATE,
                generatedAt: GENERATED_AT,
            })
        );

        expect(error).toMatchObject({
            code: 'SAMPLING_EXHAUSTED',
            details: {
                slot: 4,
                accepted: 3,
                evaluatorRejections: { no_pangram: 0, too_few_words: 0, too_many_words: 0, too_many_pangrams: 0 },
            },
        });
    });

    it('should keep history blocked when the batch is longer than the repeat window', () => {
        const small = buildSyntheticDictionary(12, 'window');
        const history = small.sets.slice(0, 5).map((letters, i) => {
            const [center = 'a', ...outside] = letters;
            return makeRecord({
                id: `live000${i}`,
                live_date: addDays(FIRST_LIVE_DATE, i - 5),
                center_letter: center,
                outside_letters: outside,
            });
        });
        const blocked = new Set(history.map(recordSignature));

        // 7 free sets for 7 slots, with only 5 days of window
        const result = generateBatch(
            WordIndex.build(small.words),
            config({ batchSize: 7, repeatWindowDays: 5 }),
            { seed: 'window', firstLiveDate: FIRST_LIVE_DATE, generatedAt: GENERATED_AT, history }
        );

        expect(result.stats.historyInWindow).toBe(5);
        expect(result.records.some((record) => blocked.has(recordSignature(record)))).toBe(false);
        expect(countRepeatViolations([...history, ...result.records], 5)).toBe(0);
    });

    it('should refuse a first live date that overlaps live history', () => {
        const history = [
            makeRecord({ live_date: '2025-03-01' }),
            makeRecord({ id: 'efgh5678', live_date: FIRST_LIVE_DATE }),
        ];

        const error = captureError(() =>
            generateBatch(index, config({ batchSize: 5 }), {
                seed: 'overlap',
                firstLiveDate: FIRST_LIVE_DATE,
                generatedAt: GENERATED_AT,
                history,
            })
        );

        expect(error).toMatchObject({
            code: 'INVALID_CONFIG',
            message: 'firstLiveDate 2025-03-02 overlaps live history, which runs until 2025-03-02',
            details: { firstLiveDate: '2025-03-02', latestLiveDate: '2025-03-02' },
        });
    });

    it('should fail when the dictionary has no seven-letter words', () => {
        const error = captureError(() =>
            generateBatch(WordIndex.build(['tear', 'train', 'rain']), config({ batchSize: 1 }), {
                seed: 1,
                firstLiveDate: FIRST_LIVE_DATE,
            })
        );
        expect(error).toMatchObject({ code: 'NO_PANGRAM_SHAPES' });
    });
});

describe('recentSignatures', () => {
    it('should keep history dated within the window before the first live date, oldest first', () => {
        const history = [
            makeRecord({ live_date: '2025-03-01', center_letter: 'a', outside_letters: [...'bcdefg'] }),
            makeRecord({ live_date: '2025-01-01', center_letter: 'h', outside_letters: [...'ijklmn'] }),
            makeRecord({ live_date: '2024-12-31', center_letter: 'o', outside_letters: [...'pqrstu'] }),
            makeRecord({ live_date: '2025-03-02', center_letter: 'v', outside_letters: [...'wxyzab'] }),
        ];

        // 2025-01-01 is 60 days before 2025-03-02; 2024-12-31 is 61
        expect(recentSignatures(history, '2025-03-02', 60)).toEqual([signatureOf('hijklmn'), signatureOf('abcdefg')]);
    });
});

describe('latestLiveDate', () => {
    it('should return the latest date or null without history', () => {
        const history = [makeRecord({ live_date: '2025-02-01' }), makeRecord({ live_date: '2025-03-10' })];
        expect(latestLiveDate(history)).toBe('2025-03-10');
        expect(latestLiveDate([])).toBeNull();
    });
});

describe('nextFreeLiveDate', () => {
    it('should continue after the latest history date', () => {
        const history = [makeRecord({ live_date: '2025-03-10' }), makeRecord({ live_date: '2025-02-01' })];
        expect(nextFreeLiveDate(history, GENERATED_AT)).toBe('2025-03-11');
    });

    it('should start tomorrow when history is empty or in the past', () => {
        expect(nextFreeLiveDate([], GENERATED_AT)).toBe('2025-03-02');
        expect(nextFreeLiveDate([makeRecord({ live_date: '2024-01-01' })], GENERATED_AT)).toBe('2025-03-02');
    });
});
