/**
 * Evaluates a letter set against the dictionary and the game rules.
 *
 * Evaluation is a pure function of (letter set, dictionary, rules): it never
 * mutates the index and always returns the same result for the same input.
 */

import type {
    EvaluationResult,
    LetterSet,
    PuzzleCandidate,
    PuzzleRules,
    Rejection,
    RejectionReason,
} from '../types/models.js';
import { allLetters, letterSetSignature } from '../utils/letters.js';
import type { WordIndex } from './word-index.js';

export const DEFAULT_RULES: Readonly<PuzzleRules> = Object.freeze({
    minWordLength: 4,
    minWords: 25,
    maxWords: 200,
    minPangrams: 1,
    maxPangrams: 6,
    pangramBonus: 10,
    bingoBonus: 10,
});

/**
 * Points for one word: 1 for a four-letter word, otherwise its length.
 */
export function wordPoints(word: string): number {
    return word.length === 4 ? 1 : word.length;
}

/**
 * True when every letter starts at least one of the words.
 */
export function isBingo(words: readonly string[], letters: readonly string[]): boolean {
    const starts = new Set(words.map((word) => word.charAt(0)));
    return letters.every((letter) => starts.has(letter));
}

export class PuzzleEvaluator {
    private readonly index: WordIndex;
    readonly rules: Readonly<PuzzleRules>;

    constructor(index: WordIndex, rules: Partial<PuzzleRules> = {}) {
        this.index = index;
        this.rules = Object.freeze({ ...DEFAULT_RULES, ...rules });
    }

    /**
     * Compute words, pangrams, bingo and score without applying the numeric gates.
     */
    analyze(letterSet: LetterSet): PuzzleCandidate {
        const letters = allLetters(letterSet);
        const fullSignature = letterSetSignature(letterSet);

        const words = this.index
            .wordsUsableWithin(letters)
            .filter((word) => word.length >= this.rules.minWordLength && word.text.includes(letterSet.center));

        const validWords = words.map((word) => word.text).sort();
        const pangrams = words
            .filter((word) => word.signature === fullSignature)
            .map((word) => word.text)
            .sort();

        const bingoPossible = isBingo(validWords, letters);

        let totalScore = 0;
        for (const word of validWords) {
            totalScore += wordPoints(word);
        }
        totalScore += pangrams.length * this.rules.pangramBonus;
        if (bingoPossible) {
            totalScore += this.rules.bingoBonus;
        }

        return {
            letterSet,
            validWords,
            pangrams,
            bingoPossible,
            totalScore,
            totalWords: validWords.length,
        };
    }

    /**
     * Evaluate a letter set and apply the game rules.
     * A rejection carries a reason code; it is never thrown.
     */
    evaluate(letterSet: LetterSet): EvaluationResult {
        const candidate = this.analyze(letterSet);
        const reason = this.checkRules(candidate);

        if (reason) {
            const rejection: Rejection = {
                reason,
                letterSet,
                totalWords: candidate.totalWords,
                pangramCount: candidate.pangrams.length,
            };
            return { ok: false, rejection };
        }
        return { ok: true, candidate };
    }

    private checkRules(candidate: PuzzleCandidate): RejectionReason | null {
        const pangramCount = candidate.pangrams.length;

        if (pangramCount === 0 || pangramCount < this.rules.minPangrams) return 'no_pangram';
        if (candidate.totalWords < this.rules.minWords) return 'too_few_words';
        if (candidate.totalWords > this.rules.maxWords) return 'too_many_words';
        if (pangramCount > this.rules.maxPangrams) return 'too_many_pangrams';
        return null;
    }
}
