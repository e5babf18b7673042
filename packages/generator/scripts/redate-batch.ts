/**
 * Reassign live dates of a puzzle file, one per day, keeping the current order.
 *
 * Usage:
 *   tsx scripts/redate-batch.ts puzzle_sets.json --start 2025-02-26
 */

import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { isGenerationError } from '../src/errors.js';
import { redateRecords } from '../src/serialization/puzzle-serializer.js';
import { loadPuzzleRecords } from '../src/services/dictionary.service.js';

interface Options {
    start: string;
    out?: string;
}

const program: Command = new Command();
program
    .name('redate-batch')
    .argument('<file>', 'puzzle JSON file')
    .requiredOption('--start <date>', 'new first live date (YYYY-MM-DD)')
    .option('--out <path>', 'output file (default: overwrite the input)')
    .parse(process.argv);

const opts = program.opts<Options>();

async function main(): Promise<void> {
    const [file] = program.args;
    if (!file) {
        program.error('missing puzzle file');
    }

    const records = await loadPuzzleRecords(file);
    const redated = redateRecords(records, opts.start);
    const out = opts.out ?? file;

    await writeFile(out, JSON.stringify(redated, null, 2), 'utf-8');

    const last = redated[redated.length - 1];
    console.log(`Updated ${redated.length} puzzles: ${opts.start} .. ${last?.live_date ?? opts.start} -> ${out}`);
}

main().catch((error: unknown) => {
    console.error(isGenerationError(error) ? `${error.code}: ${error.message}` : error);
    process.exit(1);
});
