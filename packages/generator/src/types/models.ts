/**
 * Core data models for the letter-set puzzle generator.
 * Field names of PuzzleRecord follow the JSON schema shared with the review tools.
 */

/**
 * A single lowercase ASCII letter.
 */
export type Letter = string;

/**
 * A dictionary entry after normalization. Frozen once the index is built.
 */
export interface DictionaryWord {
    /** Lowercase, letters only */
    readonly text: string;
    /** Distinct letters of the word, sorted */
    readonly letters: readonly Letter[];
    /** 26-bit mask of the distinct letters (bit 0 = 'a') */
    readonly signature: number;
    readonly length: number;
}

/**
 * Seven distinct letters: one required center letter plus six outer letters.
 */
export interface LetterSet {
    readonly center: Letter;
    /** Always six letters, sorted */
    readonly outer: readonly Letter[];
}

/**
 * Numeric game rules applied by the evaluator.
 */
export interface PuzzleRules {
    minWordLength: number;
    minWords: number;
    maxWords: number;
    minPangrams: number;
    maxPangrams: number;
    pangramBonus: number;
    bingoBonus: number;
}

/**
 * A fully evaluated letter set that passed (or was exempted from) the rules.
 */
export interface PuzzleCandidate {
    letterSet: LetterSet;
    /** Sorted alphabetically */
    validWords: string[];
    /** Sorted alphabetically; a subset of validWords */
    pangrams: string[];
    bingoPossible: boolean;
    totalScore: number;
    totalWords: number;
}

/**
 * Why the evaluator discarded a letter set.
 */
export type RejectionReason =
    | 'no_pangram'
    | 'too_few_words'
    | 'too_many_words'
    | 'too_many_pangrams';

export interface Rejection {
    reason: RejectionReason;
    letterSet: LetterSet;
    totalWords: number;
    pangramCount: number;
}

export type EvaluationResult =
    | { ok: true; candidate: PuzzleCandidate }
    | { ok: false; rejection: Rejection };

/**
 * Sampling weights in (0, 1]; 1 marks the least represented letters so far.
 */
export interface SamplingWeights {
    letters: ReadonlyMap<Letter, number>;
    centers: ReadonlyMap<Letter, number>;
}

/**
 * A candidate accepted by the scheduler with its provisional batch position.
 */
export interface ScheduledPuzzle {
    candidate: PuzzleCandidate;
    position: number;
}

/**
 * Output record. Generator-owned fields (center_letter, outside_letters,
 * pangrams) must never be changed by downstream tools.
 */
export interface PuzzleRecord {
    id: string;
    /** YYYY-MM-DD HH:MM:SS */
    last_reviewed: string;
    /** YYYY-MM-DD */
    live_date: string;
    center_letter: Letter;
    outside_letters: Letter[];
    pangrams: string[];
    bingo_possible: boolean;
    total_score: number;
    total_words: number;
    valid_words: string[];
}
