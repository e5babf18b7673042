/**
 * Batch generation pipeline.
 *
 * sampler -> evaluator -> scheduler until the batch is full, then
 * randomizer -> serializer. Synchronous and free of I/O: callers load the
 * dictionary and history first and persist the result afterwards.
 */

import type { GeneratorConfig } from '../config/generator-config.js';
import { centerTargetMap, pangramTargetMap } from '../config/generator-config.js';
import { GenerationError } from '../errors.js';
import { finalizeBatch } from '../serialization/puzzle-serializer.js';
import type { PuzzleCandidate, PuzzleRecord, RejectionReason } from '../types/models.js';
import { addDays, daysBetween, isIsoDate, toIsoDate } from '../utils/dates.js';
import { signatureOf } from '../utils/letters.js';
import { deriveSeed, type Seed } from '../utils/random.js';
import { DiversityScheduler, type SchedulerStats } from './diversity-scheduler.js';
import { LetterSetSampler } from './letter-set-sampler.js';
import { PuzzleEvaluator } from './puzzle-evaluator.js';
import { TemporalRandomizer } from './temporal-randomizer.js';
import type { WordIndex } from './word-index.js';

export interface GenerateBatchOptions {
    /** Overrides config.seed; a time-based seed is used when neither is set */
    seed?: Seed;
    /** Overrides config.firstLiveDate; must come after every history date. Defaults to the first day after both history and generatedAt */
    firstLiveDate?: string;
    /** Generation time stamped into the records (default: now) */
    generatedAt?: Date;
    /** Previously published records: they seed the repeat window and reserve their IDs */
    history?: readonly PuzzleRecord[];
}

export type RejectionTally = Record<RejectionReason, number>;

export interface BatchStats {
    proposals: number;
    evaluatorRejections: RejectionTally;
    scheduler: SchedulerStats;
    /** History records that fell inside the repeat window */
    historyInWindow: number;
    correlations: Record<string, number>;
    worstCorrelation: number;
    metCorrelationTarget: boolean;
    randomizerTrials: number;
}

export interface BatchResult {
    seed: Seed;
    firstLiveDate: string;
    generatedAt: Date;
    records: PuzzleRecord[];
    stats: BatchStats;
    warnings: string[];
}

const PROGRESS_EVERY = 20;

/**
 * Letter-set signatures of history records that went live within
 * `windowDays` days before `firstLiveDate`, oldest first.
 */
export function recentSignatures(
    history: readonly PuzzleRecord[],
    firstLiveDate: string,
    windowDays: number
): number[] {
    return history
        .filter((record) => {
            const age = daysBetween(record.live_date, firstLiveDate);
            return age > 0 && age <= windowDays;
        })
        .sort((a, b) => a.live_date.localeCompare(b.live_date))
        .map((record) => signatureOf([record.center_letter, ...record.outside_letters]));
}

export function latestLiveDate(history: readonly PuzzleRecord[]): string | null {
    let latest: string | null = null;
    for (const record of history) {
        if (latest === null || record.live_date > latest) latest = record.live_date;
    }
    return latest;
}

/**
 * Day after the latest history live date, but never earlier than the day after `today`.
 */
export function nextFreeLiveDate(history: readonly PuzzleRecord[], today: Date): string {
    const tomorrow = addDays(toIsoDate(today), 1);
    const latest = latestLiveDate(history);
    if (latest === null) return tomorrow;
    const afterHistory = addDays(latest, 1);
    return afterHistory > tomorrow ? afterHistory : tomorrow;
}

function emptyTally(): RejectionTally {
    return { no_pangram: 0, too_few_words: 0, too_many_words: 0, too_many_pangrams: 0 };
}

/**
 * Generate one batch of puzzle records.
 *
 * @throws GenerationError INVALID_CONFIG when firstLiveDate is not after every history date
 * @throws GenerationError SAMPLING_EXHAUSTED when a slot uses up its attempt budget
 * @throws GenerationError NO_PANGRAM_SHAPES when the dictionary has no seven-letter shapes
 */
export function generateBatch(
    index: WordIndex,
    config: GeneratorConfig,
    options: GenerateBatchOptions = {}
): BatchResult {
    const startTime = Date.now();
    const generatedAt = options.generatedAt ?? new Date();
    const seed = options.seed ?? config.seed ?? Date.now();
    const history = options.history ?? [];
    const firstLiveDate = options.firstLiveDate ?? config.firstLiveDate ?? nextFreeLiveDate(history, generatedAt);

    if (!isIsoDate(firstLiveDate)) {
        throw new GenerationError('INVALID_CONFIG', `firstLiveDate must be a valid YYYY-MM-DD date, got "${firstLiveDate}"`);
    }
    const latestLive = latestLiveDate(history);
    if (latestLive !== null && firstLiveDate <= latestLive) {
        throw new GenerationError(
            'INVALID_CONFIG',
            `firstLiveDate ${firstLiveDate} overlaps live history, which runs until ${latestLive}`,
            { firstLiveDate, latestLiveDate: latestLive }
        );
    }

    const evaluator = new PuzzleEvaluator(index, config.rules);
    const sampler = new LetterSetSampler(index, {
        seed: deriveSeed(seed, 'sampler'),
        minPangramWords: config.minPangramWords,
        maxDrawsPerProposal: config.maxDrawsPerProposal,
    });

    const windowSignatures = recentSignatures(history, firstLiveDate, config.repeatWindowDays);
    const scheduler = new DiversityScheduler({
        targetSize: config.batchSize,
        pangramTargets: pangramTargetMap(config),
        centerTargets: centerTargetMap(config),
        pangramSlack: config.pangramSlack,
        centerSlack: config.centerSlack,
        relaxAfter: config.relaxAfter,
        seed: deriveSeed(seed, 'scheduler'),
        recentSignatures: windowSignatures,
    });

    console.log(
        `[Generator] Batch of ${config.batchSize} from ${firstLiveDate} | seed=${seed} | ` +
            `${index.size} words, ${sampler.shapeCount} pangram shapes, ${windowSignatures.length} in repeat window`
    );

    const evaluatorRejections = emptyTally();
    let proposals = 0;
    let slotAttempts = 0;

    sampler.setWeights(scheduler.samplingWeights());

    while (!scheduler.isComplete()) {
        if (slotAttempts >= config.attemptsPerSlot) {
            const stats = scheduler.stats();
            throw new GenerationError(
                'SAMPLING_EXHAUSTED',
                `No acceptable puzzle for slot ${stats.accepted + 1} of ${config.batchSize} ` +
                    `after ${config.attemptsPerSlot} proposals`,
                {
                    slot: stats.accepted + 1,
                    accepted: stats.accepted,
                    proposals,
                    evaluatorRejections: { ...evaluatorRejections },
                    schedulerRejections: stats.rejected,
                }
            );
        }

        const letterSet = sampler.propose();
        proposals++;
        slotAttempts++;

        const result = evaluator.evaluate(letterSet);
        if (!result.ok) {
            evaluatorRejections[result.rejection.reason]++;
            continue;
        }

        if (!scheduler.offer(result.candidate)) continue;

        slotAttempts = 0;
        sampler.setWeights(scheduler.samplingWeights());

        const accepted = scheduler.batch().length;
        if (accepted % PROGRESS_EVERY === 0) {
            console.log(`[Generator] ${accepted}/${config.batchSize} accepted after ${proposals} proposals`);
        }
    }

    const randomizer = new TemporalRandomizer<PuzzleCandidate>(
        {
            words: (candidate) => candidate.totalWords,
            score: (candidate) => candidate.totalScore,
            pangrams: (candidate) => candidate.pangrams.length,
        },
        {
            seed: deriveSeed(seed, 'randomizer'),
            trials: config.randomizerTrials,
            correlationTarget: config.correlationTarget,
        }
    );
    const order = randomizer.reorder(scheduler.batch().map((scheduled) => scheduled.candidate));

    const records = finalizeBatch(order.items, {
        firstLiveDate,
        generatedAt,
        reservedIds: history.map((record) => record.id),
        maxIdRetries: config.maxIdRetries,
    });

    const warnings = order.warning ? [order.warning] : [];
    const elapsed = Date.now() - startTime;
    console.log(
        `[Generator] Completed ${records.length} puzzles in ${elapsed}ms | ` +
            `${proposals} proposals | worst |r| = ${order.worstCorrelation.toFixed(3)}`
    );

    return {
        seed,
        firstLiveDate,
        generatedAt,
        records,
        stats: {
            proposals,
            evaluatorRejections,
            scheduler: scheduler.stats(),
            historyInWindow: windowSignatures.length,
            correlations: order.correlations,
            worstCorrelation: order.worstCorrelation,
            metCorrelationTarget: order.metTarget,
            randomizerTrials: order.trialsUsed,
        },
        warnings,
    };
}
