/**
 * Print statistics for a puzzle file: pangram distribution, word counts,
 * scores, letter usage and how much difficulty trends with live date.
 *
 * Usage:
 *   tsx scripts/analyze-batch.ts puzzle_sets.json
 */

import { Command } from 'commander';
import { analyzeBatch } from '../src/services/batch-analysis.js';
import { loadPuzzleRecords } from '../src/services/dictionary.service.js';

interface Options {
    window: number;
    target: number;
}

const program: Command = new Command();
program
    .name('analyze-batch')
    .argument('<file>', 'puzzle JSON file')
    .option('--window <n>', 'repeat window in puzzles', (v) => parseInt(v, 10), 60)
    .option('--target <r>', 'largest acceptable |correlation|', (v) => parseFloat(v), 0.15)
    .parse(process.argv);

const opts = program.opts<Options>();

function percent(part: number, whole: number): string {
    return whole > 0 ? `${((part / whole) * 100).toFixed(1)}%` : '0.0%';
}

function topEntries(counts: Record<string, number>, limit: number): [string, number][] {
    return Object.entries(counts)
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .slice(0, limit);
}

async function main(): Promise<void> {
    const [file] = program.args;
    if (!file) {
        program.error('missing puzzle file');
    }

    const records = await loadPuzzleRecords(file);
    const analysis = analyzeBatch(records, opts.window);

    console.log(`Total puzzles analyzed: ${analysis.count}`);

    console.log('\nPangram statistics:');
    for (const [count, puzzles] of Object.entries(analysis.pangramHistogram)) {
        console.log(`  ${count} pangram(s): ${puzzles} puzzles (${percent(puzzles, analysis.count)})`);
    }

    console.log('\nWord count statistics:');
    console.log(`  Minimum words: ${analysis.words.min}`);
    console.log(`  Maximum words: ${analysis.words.max}`);
    console.log(`  Average words: ${analysis.words.mean.toFixed(2)}`);

    console.log('\nScore statistics:');
    console.log(`  Minimum score: ${analysis.score.min}`);
    console.log(`  Maximum score: ${analysis.score.max}`);
    console.log(`  Average score: ${analysis.score.mean.toFixed(2)}`);

    console.log(`\nBingo possible: ${analysis.bingoCount} puzzles (${percent(analysis.bingoCount, analysis.count)})`);

    console.log('\nTop 5 center letters:');
    for (const [letter, count] of topEntries(analysis.centerLetters, 5)) {
        console.log(`  ${letter}: ${count} puzzles (${percent(count, analysis.count)})`);
    }

    console.log('\nTop 10 letters overall:');
    for (const [letter, count] of topEntries(analysis.letterUsage, 10)) {
        console.log(`  ${letter}: ${count} occurrences (${percent(count, analysis.count * 7)})`);
    }

    console.log('\nCorrelation with live date:');
    for (const [signal, r] of Object.entries(analysis.correlations)) {
        const flag = Math.abs(r) > opts.target ? '  <-- above target' : '';
        console.log(`  ${signal}: ${r.toFixed(4)}${flag}`);
    }

    console.log(`\nRepeated letter sets within ${opts.window} puzzles: ${analysis.repeatViolations}`);
}

main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
