/**
 * Generation settings: schema, game defaults and environment overrides.
 *
 * Environment variables (all optional):
 * - PUZZLE_BATCH_SIZE, PUZZLE_SEED, PUZZLE_FIRST_LIVE_DATE
 * - PUZZLE_ATTEMPTS_PER_SLOT, PUZZLE_REPEAT_WINDOW_DAYS
 * - PUZZLE_PANGRAM_TARGETS: JSON object, e.g. {"1":0.2,"2":0.5,"3":0.3}
 */

import 'dotenv/config';
import { z } from 'zod';
import { GenerationError } from '../errors.js';
import type { Letter } from '../types/models.js';
import { isIsoDate } from '../utils/dates.js';

/**
 * Share of the batch for each pangram count. The figures follow the
 * distribution the puzzle editors asked for; any shape can be configured.
 */
export const DEFAULT_PANGRAM_TARGETS: Readonly<Record<string, number>> = Object.freeze({
    '1': 0.16,
    '2': 0.37,
    '3': 0.25,
    '4': 0.12,
    '5': 0.06,
    '6': 0.04,
});

const RulesSchema = z
    .object({
        minWordLength: z.number().int().min(1).default(4),
        minWords: z.number().int().min(1).default(25),
        maxWords: z.number().int().min(1).default(200),
        minPangrams: z.number().int().min(1).default(1),
        maxPangrams: z.number().int().min(1).default(6),
        pangramBonus: z.number().int().min(0).default(10),
        bingoBonus: z.number().int().min(0).default(10),
    })
    .refine((rules) => rules.minWords <= rules.maxWords, {
        message: 'rules.minWords must not exceed rules.maxWords',
    })
    .refine((rules) => rules.minPangrams <= rules.maxPangrams, {
        message: 'rules.minPangrams must not exceed rules.maxPangrams',
    });

export const GeneratorConfigSchema = z.object({
    batchSize: z.number().int().min(1).max(1000).default(180),
    seed: z.union([z.number().int(), z.string().min(1)]).optional(),
    firstLiveDate: z
        .string()
        .refine(isIsoDate, { message: 'firstLiveDate must be a valid YYYY-MM-DD date' })
        .optional(),
    repeatWindowDays: z.number().int().min(0).default(60),
    attemptsPerSlot: z.number().int().min(1).default(5000),
    rules: RulesSchema.default({}),
    pangramTargets: z
        .record(z.string().regex(/^\d+$/, 'pangram target keys must be integers'), z.number().min(0))
        .default({ ...DEFAULT_PANGRAM_TARGETS }),
    centerTargets: z.record(z.string().regex(/^[a-z]$/, 'center target keys must be letters'), z.number().min(0)).optional(),
    minPangramWords: z.number().int().min(1).default(1),
    maxDrawsPerProposal: z.number().int().min(1).default(64),
    pangramSlack: z.number().min(0).default(2),
    centerSlack: z.number().min(0).default(3),
    relaxAfter: z.number().int().min(1).default(200),
    randomizerTrials: z.number().int().min(1).default(200),
    correlationTarget: z.number().positive().max(1).default(0.15),
    maxIdRetries: z.number().int().min(0).default(5),
});

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;

const EnvSchema = z.object({
    PUZZLE_BATCH_SIZE: z.coerce.number().int().optional(),
    PUZZLE_SEED: z.string().min(1).optional(),
    PUZZLE_FIRST_LIVE_DATE: z.string().optional(),
    PUZZLE_ATTEMPTS_PER_SLOT: z.coerce.number().int().optional(),
    PUZZLE_REPEAT_WINDOW_DAYS: z.coerce.number().int().optional(),
    PUZZLE_PANGRAM_TARGETS: z.string().optional(),
});

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Validate a config object and fill in defaults.
 *
 * @throws GenerationError INVALID_CONFIG listing every failing field
 */
export function parseGeneratorConfig(input: unknown): GeneratorConfig {
    const result = GeneratorConfigSchema.safeParse(input ?? {});
    if (!result.success) {
        throw new GenerationError('INVALID_CONFIG', `Invalid generator config: ${formatIssues(result.error)}`);
    }
    return result.data;
}

function parsePangramTargets(raw: string): unknown {
    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch {
        throw new GenerationError('INVALID_CONFIG', 'PUZZLE_PANGRAM_TARGETS must be a JSON object');
    }
}

/**
 * Build a config from environment variables; explicit overrides win.
 */
export function loadConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: GeneratorConfigInput = {}
): GeneratorConfig {
    const parsedEnv = EnvSchema.safeParse(env);
    if (!parsedEnv.success) {
        throw new GenerationError('INVALID_CONFIG', `Invalid environment: ${formatIssues(parsedEnv.error)}`);
    }
    const vars = parsedEnv.data;

    const fromEnv: Record<string, unknown> = {};
    if (vars.PUZZLE_BATCH_SIZE !== undefined) fromEnv['batchSize'] = vars.PUZZLE_BATCH_SIZE;
    if (vars.PUZZLE_SEED !== undefined) fromEnv['seed'] = vars.PUZZLE_SEED;
    if (vars.PUZZLE_FIRST_LIVE_DATE !== undefined) fromEnv['firstLiveDate'] = vars.PUZZLE_FIRST_LIVE_DATE;
    if (vars.PUZZLE_ATTEMPTS_PER_SLOT !== undefined) fromEnv['attemptsPerSlot'] = vars.PUZZLE_ATTEMPTS_PER_SLOT;
    if (vars.PUZZLE_REPEAT_WINDOW_DAYS !== undefined) fromEnv['repeatWindowDays'] = vars.PUZZLE_REPEAT_WINDOW_DAYS;
    if (vars.PUZZLE_PANGRAM_TARGETS !== undefined) {
        fromEnv['pangramTargets'] = parsePangramTargets(vars.PUZZLE_PANGRAM_TARGETS);
    }

    return parseGeneratorConfig({ ...fromEnv, ...stripUndefined(overrides) });
}

function stripUndefined(input: GeneratorConfigInput): Record<string, unknown> {
    return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

export function pangramTargetMap(config: GeneratorConfig): Map<number, number> {
    return new Map(Object.entries(config.pangramTargets).map(([count, share]) => [Number(count), share]));
}

export function centerTargetMap(config: GeneratorConfig): Map<Letter, number> | undefined {
    if (!config.centerTargets) return undefined;
    return new Map(Object.entries(config.centerTargets));
}
