/**
 * In-memory dictionary index bucketed by letter-set signature.
 *
 * A query for "words usable within these letters" enumerates the sub-signatures
 * of the query set (127 for seven letters) and concatenates the matching
 * buckets, so its cost follows the size of the answer rather than the size of
 * the dictionary.
 */

import type { DictionaryWord, Letter } from '../types/models.js';
import { lettersOf, normalizeWord, popcount, signatureOf } from '../utils/letters.js';

/**
 * Counts gathered while building the index.
 */
export interface WordIndexStats {
    /** Distinct words kept */
    accepted: number;
    /** Entries dropped for being empty or non-alphabetic */
    skipped: number;
    /** Repeated entries collapsed into one */
    duplicates: number;
}

/**
 * A seven-letter signature and the number of words that use exactly its letters.
 */
export interface PangramShape {
    signature: number;
    letters: readonly Letter[];
    wordCount: number;
}

const PANGRAM_LETTER_COUNT = 7;

export class WordIndex {
    private readonly buckets: ReadonlyMap<number, readonly DictionaryWord[]>;
    readonly stats: Readonly<WordIndexStats>;

    private constructor(buckets: Map<number, DictionaryWord[]>, stats: WordIndexStats) {
        this.buckets = buckets;
        this.stats = Object.freeze(stats);
    }

    /**
     * Build an index from raw dictionary entries.
     * Malformed entries are skipped, never fatal.
     */
    static build(entries: Iterable<string>): WordIndex {
        const buckets = new Map<number, DictionaryWord[]>();
        const seen = new Set<string>();
        const stats: WordIndexStats = { accepted: 0, skipped: 0, duplicates: 0 };

        for (const entry of entries) {
            const text = normalizeWord(entry);
            if (text === null) {
                stats.skipped++;
                continue;
            }
            if (seen.has(text)) {
                stats.duplicates++;
                continue;
            }
            seen.add(text);

            const signature = signatureOf(text);
            const word: DictionaryWord = Object.freeze({
                text,
                letters: Object.freeze(lettersOf(signature)),
                signature,
                length: text.length,
            });

            const bucket = buckets.get(signature);
            if (bucket) {
                bucket.push(word);
            } else {
                buckets.set(signature, [word]);
            }
            stats.accepted++;
        }

        return new WordIndex(buckets, stats);
    }

    /**
     * Number of distinct words in the index.
     */
    get size(): number {
        return this.stats.accepted;
    }

    /**
     * Every word whose letters are a subset of `letters`.
     */
    wordsUsableWithin(letters: Iterable<Letter>): readonly DictionaryWord[] {
        const query = signatureOf(letters);
        if (query === 0 || this.buckets.size === 0) {
            return [];
        }

        const results: DictionaryWord[] = [];

        // Enumerating 2^k sub-signatures only pays off while it is cheaper than a bucket scan
        if (2 ** popcount(query) > this.buckets.size) {
            for (const [signature, words] of this.buckets) {
                if ((signature & ~query) === 0) {
                    results.push(...words);
                }
            }
            return results;
        }

        for (let sub = query; sub > 0; sub = (sub - 1) & query) {
            const words = this.buckets.get(sub);
            if (words) {
                results.push(...words);
            }
        }
        return results;
    }

    /**
     * Words whose distinct letters are exactly `letters`.
     */
    wordsWithLetters(letters: Iterable<Letter>): readonly DictionaryWord[] {
        return this.buckets.get(signatureOf(letters)) ?? [];
    }

    /**
     * Seven-letter signatures carried by at least `minWords` words,
     * ordered by signature for reproducible sampling.
     */
    pangramShapes(minWords = 1): PangramShape[] {
        const shapes: PangramShape[] = [];
        for (const [signature, words] of this.buckets) {
            if (popcount(signature) !== PANGRAM_LETTER_COUNT) continue;
            if (words.length < minWords) continue;
            shapes.push({ signature, letters: lettersOf(signature), wordCount: words.length });
        }
        return shapes.sort((a, b) => a.signature - b.signature);
    }
}
