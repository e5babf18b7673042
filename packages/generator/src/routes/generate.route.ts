/**
 * API routes for batch generation and custom puzzles.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { GeneratorConfig } from '../config/generator-config.js';
import { toCustomRecord } from '../serialization/puzzle-serializer.js';
import { generateBatch } from '../services/batch-generator.js';
import { generateBatchId, listAllPuzzles, saveBatch } from '../services/persistence.service.js';
import { PuzzleEvaluator } from '../services/puzzle-evaluator.js';
import type { WordIndex } from '../services/word-index.js';
import { isIsoDate, toIsoDate } from '../utils/dates.js';
import { createLetterSet } from '../utils/letters.js';

/**
 * Dictionary and settings shared by every request.
 */
export interface GeneratorContext {
    index: WordIndex;
    config: GeneratorConfig;
}

const IsoDateSchema = z.string().refine(isIsoDate, { message: 'must be a valid YYYY-MM-DD date' });
const LetterSchema = z.string().regex(/^[a-zA-Z]$/, 'must be a single letter');

const CreateBatchSchema = z.object({
    batchSize: z.number().int().min(1).max(1000).optional(),
    seed: z.union([z.number().int(), z.string().min(1)]).optional(),
    firstLiveDate: IsoDateSchema.optional(),
});

const CustomPuzzleSchema = z.object({
    center: LetterSchema,
    outside: z.array(LetterSchema).length(6, 'outside must contain exactly 6 letters'),
    liveDate: IsoDateSchema.optional(),
});

type CreateBatchRequest = z.input<typeof CreateBatchSchema>;
type CustomPuzzleRequest = z.input<typeof CustomPuzzleSchema>;

/**
 * Register generation routes.
 */
export async function registerGenerateRoutes(fastify: FastifyInstance, context: GeneratorContext): Promise<void> {
    /**
     * POST /batches
     * Generate a batch against the server dictionary. Every stored batch
     * counts as live history for repeat avoidance and ID reservation.
     */
    fastify.post(
        '/batches',
        async (request: FastifyRequest<{ Body: CreateBatchRequest | undefined }>, reply: FastifyReply) => {
            const input = CreateBatchSchema.parse(request.body ?? {});
            const config: GeneratorConfig = {
                ...context.config,
                batchSize: input.batchSize ?? context.config.batchSize,
            };

            const history = await listAllPuzzles();
            console.log(`[API] Generating batch of ${config.batchSize} with ${history.length} history records`);

            const result = generateBatch(context.index, config, {
                seed: input.seed,
                firstLiveDate: input.firstLiveDate,
                history,
            });

            const batchId = generateBatchId();
            const { meta, summary } = await saveBatch(batchId, result, config.repeatWindowDays, context.index.size);

            reply.code(201);
            return {
                success: true,
                batchId,
                meta,
                summary,
                warnings: result.warnings,
            };
        }
    );

    /**
     * POST /puzzles/custom
     * Evaluate a hand-picked letter set. The record is returned, not stored;
     * rule violations are reported as a warning instead of an error.
     */
    fastify.post(
        '/puzzles/custom',
        async (request: FastifyRequest<{ Body: CustomPuzzleRequest }>) => {
            const input = CustomPuzzleSchema.parse(request.body);
            const letterSet = createLetterSet(input.center, input.outside);

            const evaluator = new PuzzleEvaluator(context.index, context.config.rules);
            const evaluation = evaluator.evaluate(letterSet);
            const candidate = evaluation.ok ? evaluation.candidate : evaluator.analyze(letterSet);

            const now = new Date();
            const puzzle = toCustomRecord(candidate, {
                liveDate: input.liveDate ?? toIsoDate(now),
                generatedAt: now,
            });

            return {
                success: true,
                puzzle,
                warning: evaluation.ok ? undefined : `Letter set fails rule: ${evaluation.rejection.reason}`,
            };
        }
    );
}
