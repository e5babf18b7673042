export type GenerationErrorCode =
    | 'SAMPLING_EXHAUSTED'
    | 'NO_PANGRAM_SHAPES'
    | 'ID_COLLISION'
    | 'INVALID_LETTER_SET'
    | 'INVALID_CONFIG'
    | 'INVALID_DICTIONARY';

/**
 * Error raised when a generation run cannot complete.
 * Evaluator rejections are not errors; they are tallied and resampled.
 */
export class GenerationError extends Error {
    readonly code: GenerationErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(code: GenerationErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'GenerationError';
        this.code = code;
        this.details = details;
    }
}

export function isGenerationError(error: unknown): error is GenerationError {
    return error instanceof GenerationError;
}

/**
 * True for a filesystem "no such file or directory" error.
 */
export function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
