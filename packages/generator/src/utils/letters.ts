/**
 * Letter and letter-set utilities.
 * A signature is a 26-bit mask of the distinct letters in a word or set (bit 0 = 'a').
 */

import { GenerationError } from '../errors.js';
import type { Letter, LetterSet } from '../types/models.js';

const CHAR_CODE_A = 97;
const WORD_PATTERN = /^[a-z]+$/;

export const ALPHABET: readonly Letter[] = Array.from({ length: 26 }, (_, i) =>
    String.fromCharCode(CHAR_CODE_A + i)
);

/**
 * Normalize a raw dictionary entry.
 *
 * @returns The lowercase word, or null when the entry is empty or contains
 * anything other than the letters a-z
 *
 * @example
 * normalizeWord("  Orient ") // "orient"
 * normalizeWord("don't")     // null
 */
export function normalizeWord(raw: string): string | null {
    const word = raw.trim().toLowerCase();
    if (!WORD_PATTERN.test(word)) {
        return null;
    }
    return word;
}

export function isLetter(value: string): boolean {
    return value.length === 1 && WORD_PATTERN.test(value);
}

/**
 * Bit for a single lowercase letter.
 */
export function letterBit(letter: Letter): number {
    return 1 << (letter.charCodeAt(0) - CHAR_CODE_A);
}

/**
 * Signature of a word or any collection of letters.
 */
export function signatureOf(letters: Iterable<Letter>): number {
    let mask = 0;
    for (const letter of letters) {
        mask |= letterBit(letter);
    }
    return mask;
}

/**
 * Letters present in a signature, in alphabetical order.
 */
export function lettersOf(signature: number): Letter[] {
    const letters: Letter[] = [];
    for (let i = 0; i < 26; i++) {
        if (signature & (1 << i)) {
            letters.push(String.fromCharCode(CHAR_CODE_A + i));
        }
    }
    return letters;
}

/**
 * Number of distinct letters in a signature.
 */
export function popcount(signature: number): number {
    let count = 0;
    let mask = signature;
    while (mask) {
        mask &= mask - 1;
        count++;
    }
    return count;
}

/**
 * Build a validated LetterSet.
 *
 * @throws GenerationError INVALID_LETTER_SET unless center + outer are seven
 * distinct lowercase letters with the center not among the outer letters
 */
export function createLetterSet(center: string, outer: readonly string[]): LetterSet {
    const normalizedCenter = center.toLowerCase();
    const normalizedOuter = outer.map((letter) => letter.toLowerCase());

    if (!isLetter(normalizedCenter)) {
        throw new GenerationError('INVALID_LETTER_SET', `Center must be a single letter, got "${center}"`);
    }
    if (normalizedOuter.length !== 6) {
        throw new GenerationError(
            'INVALID_LETTER_SET',
            `Expected 6 outer letters, got ${normalizedOuter.length}`
        );
    }
    for (const letter of normalizedOuter) {
        if (!isLetter(letter)) {
            throw new GenerationError('INVALID_LETTER_SET', `Outer letters must be single letters, got "${letter}"`);
        }
    }
    if (normalizedOuter.includes(normalizedCenter)) {
        throw new GenerationError(
            'INVALID_LETTER_SET',
            `Center letter "${normalizedCenter}" cannot also be an outer letter`
        );
    }
    if (new Set(normalizedOuter).size !== 6) {
        throw new GenerationError('INVALID_LETTER_SET', 'Outer letters must be distinct');
    }

    return Object.freeze({
        center: normalizedCenter,
        outer: Object.freeze([...normalizedOuter].sort()),
    });
}

/**
 * Center first, then the outer letters.
 */
export function allLetters(letterSet: LetterSet): Letter[] {
    return [letterSet.center, ...letterSet.outer];
}

/**
 * Signature of all seven letters; ignores which one is the center.
 */
export function letterSetSignature(letterSet: LetterSet): number {
    return signatureOf(allLetters(letterSet));
}

/**
 * Stable display key, e.g. "i:aenort".
 */
export function letterSetKey(letterSet: LetterSet): string {
    return `${letterSet.center}:${letterSet.outer.join('')}`;
}
