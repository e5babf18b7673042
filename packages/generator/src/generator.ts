/**
 * Public library surface of @hexword/generator.
 */

export * from './types/models.js';
export { GenerationError, isGenerationError, type GenerationErrorCode } from './errors.js';
export {
    DEFAULT_PANGRAM_TARGETS,
    GeneratorConfigSchema,
    loadConfigFromEnv,
    parseGeneratorConfig,
    type GeneratorConfig,
    type GeneratorConfigInput,
} from './config/generator-config.js';
export { WordIndex, type PangramShape, type WordIndexStats } from './services/word-index.js';
export { LetterSetSampler, type SamplerConfig } from './services/letter-set-sampler.js';
export { DEFAULT_RULES, PuzzleEvaluator, isBingo, wordPoints } from './services/puzzle-evaluator.js';
export { DiversityScheduler, type SchedulerConfig, type SchedulerStats } from './services/diversity-scheduler.js';
export { TemporalRandomizer, type RandomizedOrder, type RandomizerConfig, type Signal } from './services/temporal-randomizer.js';
export {
    generateBatch,
    latestLiveDate,
    nextFreeLiveDate,
    type BatchResult,
    type BatchStats,
    type GenerateBatchOptions,
} from './services/batch-generator.js';
export { analyzeBatch, type BatchAnalysis } from './services/batch-analysis.js';
export { loadDictionary, loadPuzzleRecords, parseDictionary } from './services/dictionary.service.js';
export {
    PuzzleRecordSchema,
    finalizeBatch,
    puzzleId,
    redateRecords,
    toCustomRecord,
} from './serialization/puzzle-serializer.js';
export { createLetterSet, letterSetKey } from './utils/letters.js';
export { createServer } from './server.js';
