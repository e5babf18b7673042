/**
 * Dictionary and puzzle file loading.
 *
 * Dictionary formats:
 * - JSON object of word -> frequency (the output of the dictionary filter)
 * - JSON array of words
 * - plain text, one word per line
 *
 * Words the reviewers rejected are listed in an optional word cache
 * `{ "valid": [...], "rejected": [...] }` and excluded before indexing.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { GenerationError, isMissingFile } from '../errors.js';
import { PuzzleRecordListSchema } from '../serialization/puzzle-serializer.js';
import type { PuzzleRecord } from '../types/models.js';
import { normalizeWord } from '../utils/letters.js';
import { WordIndex } from './word-index.js';

export type DictionaryFormat = 'json-object' | 'json-array' | 'text';

export interface LoadDictionaryOptions {
    wordCachePath?: string;
}

export interface LoadedDictionary {
    index: WordIndex;
    format: DictionaryFormat;
    /** Entries dropped because the word cache rejected them */
    excluded: number;
}

const FrequencyDictionarySchema = z.record(z.string(), z.number());
const WordListSchema = z.array(z.string());
const WordCacheSchema = z.object({
    valid: z.array(z.string()).default([]),
    rejected: z.array(z.string()).default([]),
});

async function readText(path: string, label: string): Promise<string> {
    try {
        return await readFile(path, 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new GenerationError('INVALID_DICTIONARY', `Cannot read ${label} at ${path}: ${reason}`);
    }
}

function parseJson(content: string, label: string): unknown {
    try {
        const parsed: unknown = JSON.parse(content);
        return parsed;
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new GenerationError('INVALID_DICTIONARY', `${label} is not valid JSON: ${reason}`);
    }
}

/**
 * Extract raw entries from dictionary file content. Entries are not normalized here.
 */
export function parseDictionary(content: string): { words: string[]; format: DictionaryFormat } {
    const trimmed = content.trim();

    if (trimmed.startsWith('{')) {
        const result = FrequencyDictionarySchema.safeParse(parseJson(trimmed, 'Dictionary'));
        if (!result.success) {
            throw new GenerationError('INVALID_DICTIONARY', 'Dictionary object must map words to numeric frequencies');
        }
        return { words: Object.keys(result.data), format: 'json-object' };
    }

    if (trimmed.startsWith('[')) {
        const result = WordListSchema.safeParse(parseJson(trimmed, 'Dictionary'));
        if (!result.success) {
            throw new GenerationError('INVALID_DICTIONARY', 'Dictionary array must contain only strings');
        }
        return { words: result.data, format: 'json-array' };
    }

    const words = trimmed
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    return { words, format: 'text' };
}

/**
 * Read the rejected words of a word cache. A missing cache file means none.
 */
export async function loadRejectedWords(path: string): Promise<Set<string>> {
    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (error) {
        if (isMissingFile(error)) {
            console.warn(`[Dictionary] Word cache not found at ${path}; no words excluded`);
            return new Set();
        }
        throw error;
    }

    const result = WordCacheSchema.safeParse(parseJson(content, 'Word cache'));
    if (!result.success) {
        throw new GenerationError('INVALID_DICTIONARY', 'Word cache must look like { "valid": [], "rejected": [] }');
    }

    const rejected = new Set<string>();
    for (const word of result.data.rejected) {
        const normalized = normalizeWord(word);
        if (normalized !== null) rejected.add(normalized);
    }
    return rejected;
}

/**
 * Load a dictionary file into a frozen WordIndex.
 */
export async function loadDictionary(path: string, options: LoadDictionaryOptions = {}): Promise<LoadedDictionary> {
    const { words, format } = parseDictionary(await readText(path, 'dictionary'));
    const rejected = options.wordCachePath ? await loadRejectedWords(options.wordCachePath) : new Set<string>();

    const kept = words.filter((word) => {
        const normalized = normalizeWord(word);
        return normalized === null || !rejected.has(normalized);
    });
    const index = WordIndex.build(kept);

    console.log(
        `[Dictionary] Loaded ${index.size} words from ${path} (${format}) | ` +
            `skipped ${index.stats.skipped}, duplicates ${index.stats.duplicates}, excluded ${words.length - kept.length}`
    );

    return { index, format, excluded: words.length - kept.length };
}

/**
 * Read and validate a JSON array of puzzle records.
 */
export async function loadPuzzleRecords(path: string): Promise<PuzzleRecord[]> {
    const content = await readText(path, 'puzzle file');
    const result = PuzzleRecordListSchema.safeParse(parseJson(content, 'Puzzle file'));
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
        throw new GenerationError('INVALID_DICTIONARY', `Invalid puzzle file ${path}: ${where}`);
    }
    return result.data;
}
