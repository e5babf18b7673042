/**
 * Build a single puzzle from hand-picked letters. No rule gates are applied;
 * rule failures are reported as warnings.
 *
 * Usage:
 *   tsx scripts/custom-puzzle.ts -c a -o b,c,d,e,f,g --dictionary data/dictionary.json
 */

import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { isGenerationError } from '../src/errors.js';
import { toCustomRecord } from '../src/serialization/puzzle-serializer.js';
import { loadDictionary, loadPuzzleRecords } from '../src/services/dictionary.service.js';
import { PuzzleEvaluator } from '../src/services/puzzle-evaluator.js';
import { toIsoDate } from '../src/utils/dates.js';
import { createLetterSet } from '../src/utils/letters.js';

interface Options {
    center: string;
    outside: string;
    dictionary: string;
    wordCache?: string;
    date?: string;
    append?: string;
}

const program = new Command();
program
    .name('custom-puzzle')
    .requiredOption('-c, --center <letter>', 'center letter')
    .requiredOption('-o, --outside <letters>', 'six outside letters, e.g. "b,c,d,e,f,g" or "bcdefg"')
    .option('--dictionary <path>', 'dictionary file', process.env['DICTIONARY_PATH'] ?? 'data/dictionary.json')
    .option('--word-cache <path>', 'word cache whose rejected words are excluded', process.env['WORD_CACHE_PATH'])
    .option('--date <date>', 'live date (YYYY-MM-DD, default: today)')
    .option('--append <file>', 'append the puzzle to an existing puzzle file')
    .parse(process.argv);

const opts = program.opts<Options>();

async function main(): Promise<void> {
    const outside = opts.outside.includes(',') ? opts.outside.split(',').map((l) => l.trim()) : [...opts.outside];
    const letterSet = createLetterSet(opts.center, outside);

    const { index } = await loadDictionary(opts.dictionary, { wordCachePath: opts.wordCache });
    const evaluator = new PuzzleEvaluator(index);
    const evaluation = evaluator.evaluate(letterSet);
    const candidate = evaluation.ok ? evaluation.candidate : evaluator.analyze(letterSet);

    const existing = opts.append ? await loadPuzzleRecords(opts.append) : [];
    const now = new Date();
    const record = toCustomRecord(candidate, {
        liveDate: opts.date ?? toIsoDate(now),
        generatedAt: now,
        reservedIds: existing.map((puzzle) => puzzle.id),
    });

    if (!evaluation.ok) {
        console.warn(`Warning: letter set fails rule ${evaluation.rejection.reason}`);
    }

    if (opts.append) {
        await writeFile(opts.append, JSON.stringify([...existing, record], null, 2), 'utf-8');
        console.log(`Appended ${record.id} to ${opts.append}`);
    } else {
        console.log(JSON.stringify(record, null, 2));
    }
}

main().catch((error: unknown) => {
    console.error(isGenerationError(error) ? `${error.code}: ${error.message}` : error);
    process.exit(1);
});
