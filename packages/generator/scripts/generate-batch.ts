/**
 * Generate a puzzle batch from a dictionary file and write it as JSON.
 *
 * Usage:
 *   tsx scripts/generate-batch.ts --dictionary data/dictionary.json --out puzzle_sets.json \
 *     --history data/live_puzzles.json --seed 42 --start 2025-03-01
 */

import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { loadConfigFromEnv, type GeneratorConfigInput } from '../src/config/generator-config.js';
import { initializeDataDir } from '../src/config/data-dir.js';
import { isGenerationError } from '../src/errors.js';
import { generateBatch } from '../src/services/batch-generator.js';
import { loadDictionary, loadPuzzleRecords } from '../src/services/dictionary.service.js';
import { generateBatchId, listAllPuzzles, saveBatch } from '../src/services/persistence.service.js';
import type { PuzzleRecord } from '../src/types/models.js';

interface Options {
    dictionary: string;
    wordCache?: string;
    history: string[];
    storedHistory?: boolean;
    out: string;
    size?: number;
    seed?: string;
    start?: string;
    save?: boolean;
}

const program = new Command();
program
    .name('generate-batch')
    .option('--dictionary <path>', 'dictionary file (JSON object, JSON array or text)', process.env['DICTIONARY_PATH'] ?? 'data/dictionary.json')
    .option('--word-cache <path>', 'word cache whose rejected words are excluded', process.env['WORD_CACHE_PATH'])
    .option('--history <path...>', 'puzzle files already live (repeat window and reserved IDs)', [])
    .option('--stored-history', 'also use every batch stored in the data directory as history')
    .option('--out <path>', 'output JSON file', 'puzzle_sets.json')
    .option('--size <n>', 'number of puzzles', (v) => parseInt(v, 10))
    .option('--seed <seed>', 'batch seed')
    .option('--start <date>', 'first live date (YYYY-MM-DD)')
    .option('--save', 'also store the batch in the data directory')
    .parse(process.argv);

const opts = program.opts<Options>();

async function main(): Promise<void> {
    const overrides: GeneratorConfigInput = {};
    if (opts.size !== undefined) overrides.batchSize = opts.size;
    if (opts.seed !== undefined) overrides.seed = opts.seed;
    if (opts.start !== undefined) overrides.firstLiveDate = opts.start;
    const config = loadConfigFromEnv(process.env, overrides);

    const { index } = await loadDictionary(opts.dictionary, { wordCachePath: opts.wordCache });

    const history: PuzzleRecord[] = [];
    for (const path of opts.history) {
        history.push(...(await loadPuzzleRecords(path)));
    }
    if (opts.storedHistory || opts.save) {
        initializeDataDir();
    }
    if (opts.storedHistory) {
        history.push(...(await listAllPuzzles()));
    }

    const result = generateBatch(index, config, { history });
    await writeFile(opts.out, JSON.stringify(result.records, null, 2), 'utf-8');
    console.log(`Wrote ${result.records.length} puzzles to ${opts.out} (seed ${result.seed})`);

    for (const warning of result.warnings) {
        console.warn(`Warning: ${warning}`);
    }

    if (opts.save) {
        const batchId = generateBatchId();
        await saveBatch(batchId, result, config.repeatWindowDays, index.size);
        console.log(`Stored as ${batchId}`);
    }
}

main().catch((error: unknown) => {
    if (isGenerationError(error)) {
        console.error(`${error.code}: ${error.message}`);
        if (error.details) console.error(JSON.stringify(error.details, null, 2));
    } else {
        console.error(error);
    }
    process.exit(1);
});
