/**
 * Puzzle record serialization.
 *
 * Turns an ordered batch of candidates into the JSON records consumed by the
 * review tools and the game client: one record per day, starting at the first
 * live date, each with a short content-derived ID.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { GenerationError } from '../errors.js';
import type { PuzzleCandidate, PuzzleRecord } from '../types/models.js';
import { addDays, formatTimestamp, isIsoDate } from '../utils/dates.js';
import { letterSetKey } from '../utils/letters.js';

const ID_LENGTH = 8;
const DEFAULT_MAX_ID_RETRIES = 5;

const LetterSchema = z.string().regex(/^[a-z]$/, 'must be a single lowercase letter');

/**
 * Schema of a stored puzzle record. Unknown keys added by review tools are kept.
 */
export const PuzzleRecordSchema = z
    .object({
        id: z.string().min(1),
        last_reviewed: z.string(),
        live_date: z.string().refine(isIsoDate, { message: 'live_date must be YYYY-MM-DD' }),
        center_letter: LetterSchema,
        outside_letters: z.array(LetterSchema).length(6),
        pangrams: z.array(z.string()),
        bingo_possible: z.boolean(),
        total_score: z.number().int(),
        total_words: z.number().int().min(0),
        valid_words: z.array(z.string()),
    })
    .passthrough();

export const PuzzleRecordListSchema = z.array(PuzzleRecordSchema);

export interface FinalizeOptions {
    /** Live date of the first record (YYYY-MM-DD) */
    firstLiveDate: string;
    /** Stamped into every record's last_reviewed */
    generatedAt: Date;
    /** IDs already in use, e.g. by live history */
    reservedIds?: Iterable<string>;
    /** Regenerations allowed per record before giving up (default: 5) */
    maxIdRetries?: number;
}

export interface CustomRecordOptions {
    liveDate: string;
    generatedAt: Date;
    reservedIds?: Iterable<string>;
}

/**
 * 8-hex-char ID for the puzzle at `index`. Bumping `attempt` gives a fresh ID.
 *
 * @example
 * puzzleId('i:aenort', 0, 0) // first 8 hex chars of sha256("i:aenort|0|0")
 */
export function puzzleId(key: string, index: number, attempt: number): string {
    return createHash('sha256').update(`${key}|${index}|${attempt}`).digest('hex').slice(0, ID_LENGTH);
}

function assertLiveDate(date: string, field: string): void {
    if (!isIsoDate(date)) {
        throw new GenerationError('INVALID_CONFIG', `${field} must be a valid YYYY-MM-DD date, got "${date}"`);
    }
}

function allocateId(
    candidate: PuzzleCandidate,
    index: number,
    used: Set<string>,
    maxRetries: number
): string {
    const key = letterSetKey(candidate.letterSet);
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
        const id = puzzleId(key, index, attempt);
        if (!used.has(id)) {
            used.add(id);
            return id;
        }
    }
    throw new GenerationError(
        'ID_COLLISION',
        `Could not allocate a unique ID for ${key} after ${maxRetries + 1} attempts`,
        { letterSet: key, index }
    );
}

function toRecord(candidate: PuzzleCandidate, id: string, liveDate: string, reviewedAt: string): PuzzleRecord {
    return {
        id,
        last_reviewed: reviewedAt,
        live_date: liveDate,
        center_letter: candidate.letterSet.center,
        outside_letters: [...candidate.letterSet.outer],
        pangrams: [...candidate.pangrams],
        bingo_possible: candidate.bingoPossible,
        total_score: candidate.totalScore,
        total_words: candidate.totalWords,
        valid_words: [...candidate.validWords],
    };
}

/**
 * Serialize an ordered batch. Record `i` goes live `i` days after the first date.
 *
 * @throws GenerationError ID_COLLISION when a record exhausts its retries
 */
export function finalizeBatch(ordered: readonly PuzzleCandidate[], options: FinalizeOptions): PuzzleRecord[] {
    assertLiveDate(options.firstLiveDate, 'firstLiveDate');

    const used = new Set(options.reservedIds ?? []);
    const maxRetries = options.maxIdRetries ?? DEFAULT_MAX_ID_RETRIES;
    const reviewedAt = formatTimestamp(options.generatedAt);

    return ordered.map((candidate, index) =>
        toRecord(
            candidate,
            allocateId(candidate, index, used, maxRetries),
            addDays(options.firstLiveDate, index),
            reviewedAt
        )
    );
}

/**
 * Reassign live dates in the current order, one per day from `firstLiveDate`.
 * Every other field is carried over untouched.
 */
export function redateRecords<T extends PuzzleRecord>(records: readonly T[], firstLiveDate: string): T[] {
    assertLiveDate(firstLiveDate, 'firstLiveDate');
    return records.map((record, index) => ({ ...record, live_date: addDays(firstLiveDate, index) }));
}

/**
 * Record for a hand-picked letter set. No rule gates are applied.
 */
export function toCustomRecord(candidate: PuzzleCandidate, options: CustomRecordOptions): PuzzleRecord {
    assertLiveDate(options.liveDate, 'liveDate');
    const used = new Set(options.reservedIds ?? []);
    const id = allocateId(candidate, 0, used, DEFAULT_MAX_ID_RETRIES);
    return toRecord(candidate, id, options.liveDate, formatTimestamp(options.generatedAt));
}
