/**
 * Tests for letter utilities.
 */

import { describe, it, expect } from 'vitest';
import { GenerationError } from '../errors.js';
import {
    allLetters,
    createLetterSet,
    letterSetKey,
    letterSetSignature,
    lettersOf,
    normalizeWord,
    popcount,
    signatureOf,
} from '../utils/letters.js';
import { captureError } from './helpers.js';

describe('normalizeWord', () => {
    it('should trim and lowercase', () => {
        expect(normalizeWord('  Orient ')).toBe('orient');
    });

    it('should reject empty and non-alphabetic entries', () => {
        expect(normalizeWord('')).toBeNull();
        expect(normalizeWord('   ')).toBeNull();
        expect(normalizeWord("don't")).toBeNull();
        expect(normalizeWord('café')).toBeNull();
        expect(normalizeWord('two words')).toBeNull();
    });
});

describe('signatures', () => {
    it('should ignore repeated letters', () => {
        expect(signatureOf('attire')).toBe(signatureOf('aeirt'));
    });

    it('should map a to bit 0 and z to bit 25', () => {
        expect(signatureOf('a')).toBe(1);
        expect(signatureOf('z')).toBe(1 << 25);
    });

    it('should round-trip letters in alphabetical order', () => {
        expect(lettersOf(signatureOf('orientation'))).toEqual(['a', 'e', 'i', 'n', 'o', 'r', 't']);
    });

    it('should count distinct letters', () => {
        expect(popcount(signatureOf('orientation'))).toBe(7);
        expect(popcount(0)).toBe(0);
    });
});

describe('createLetterSet', () => {
    it('should lowercase and sort the outer letters', () => {
        const letterSet = createLetterSet('I', ['T', 'r', 'o', 'n', 'e', 'a']);
        expect(letterSet.center).toBe('i');
        expect(letterSet.outer).toEqual(['a', 'e', 'n', 'o', 'r', 't']);
        expect(letterSetKey(letterSet)).toBe('i:aenort');
        expect(allLetters(letterSet)).toEqual(['i', 'a', 'e', 'n', 'o', 'r', 't']);
    });

    it('should give the same signature whichever letter is the center', () => {
        const a = createLetterSet('i', ['a', 'e', 'n', 'o', 'r', 't']);
        const b = createLetterSet('a', ['i', 'e', 'n', 'o', 'r', 't']);
        expect(letterSetSignature(a)).toBe(letterSetSignature(b));
    });

    it.each([
        ['center among outer letters', 'a', ['a', 'b', 'c', 'd', 'e', 'f']],
        ['too few outer letters', 'a', ['b', 'c', 'd', 'e', 'f']],
        ['too many outer letters', 'a', ['b', 'c', 'd', 'e', 'f', 'g', 'h']],
        ['repeated outer letters', 'a', ['b', 'b', 'c', 'd', 'e', 'f']],
        ['non-letter center', '1', ['b', 'c', 'd', 'e', 'f', 'g']],
        ['multi-character outer letter', 'a', ['bc', 'd', 'e', 'f', 'g', 'h']],
    ])('should reject %s', (_label, center, outer) => {
        const error = captureError(() => createLetterSet(center, outer));
        expect(error).toBeInstanceOf(GenerationError);
        expect(error).toMatchObject({ code: 'INVALID_LETTER_SET' });
    });
});
