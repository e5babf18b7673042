/**
 * Batch persistence service.
 *
 * Implements file-based artifact storage for generated batches.
 * Each batch is stored as an immutable directory with standardized artifacts:
 * meta.json, puzzles.json and summary.json.
 */

import { randomUUID } from 'crypto';
import { mkdir, readFile, readdir, rename, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { getDataDir } from '../config/data-dir.js';
import { isMissingFile } from '../errors.js';
import { PuzzleRecordListSchema } from '../serialization/puzzle-serializer.js';
import type { PuzzleRecord } from '../types/models.js';
import { analyzeBatch, type BatchAnalysis } from './batch-analysis.js';
import type { BatchResult, RejectionTally } from './batch-generator.js';
import type { SchedulerStats } from './diversity-scheduler.js';

const BATCH_ID_PATTERN = /^batch_[0-9a-f-]{12}$/;

/**
 * Batch metadata structure.
 */
export interface BatchMeta {
    id: string;
    createdAt: string;
    seed: string | number;
    firstLiveDate: string;
    lastLiveDate: string;
    puzzleCount: number;
    dictionaryWords: number;
}

/**
 * Summary artifact: generation statistics plus an analysis of the records.
 */
export interface BatchSummary {
    proposals: number;
    evaluatorRejections: RejectionTally;
    schedulerRejections: SchedulerStats['rejected'];
    metCorrelationTarget: boolean;
    analysis: BatchAnalysis;
    warnings: string[];
}

export interface BatchBundle {
    meta: BatchMeta;
    summary: BatchSummary;
    puzzles: PuzzleRecord[];
}

/**
 * List item for history view.
 */
export interface BatchListItem {
    id: string;
    createdAt: string;
    firstLiveDate: string;
    lastLiveDate: string;
    puzzleCount: number;
    warning?: string;
}

export function generateBatchId(): string {
    return `batch_${randomUUID().slice(0, 12)}`;
}

export function isBatchId(value: string): boolean {
    return BATCH_ID_PATTERN.test(value);
}

function getBatchDir(batchId: string): string {
    return join(getDataDir(), batchId);
}

/**
 * Write a JSON artifact atomically.
 * Writes to a temp file first, then renames.
 */
async function writeArtifact<T>(batchId: string, filename: string, data: T): Promise<void> {
    const dir = getBatchDir(batchId);
    await mkdir(dir, { recursive: true });

    const filepath = join(dir, filename);
    const temppath = `${filepath}.tmp`;

    await writeFile(temppath, JSON.stringify(data, null, 2), 'utf-8');
    await rename(temppath, filepath);
}

/**
 * Read a JSON artifact. Returns null when the file does not exist.
 */
async function readArtifact<T>(batchId: string, filename: string): Promise<T | null> {
    try {
        const content = await readFile(join(getBatchDir(batchId), filename), 'utf-8');
        return JSON.parse(content) as T;
    } catch (error) {
        if (isMissingFile(error)) return null;
        throw error;
    }
}

/**
 * Persist a generated batch and return its metadata.
 */
export async function saveBatch(
    batchId: string,
    result: BatchResult,
    repeatWindow: number,
    dictionaryWords: number
): Promise<{ meta: BatchMeta; summary: BatchSummary }> {
    const lastRecord = result.records[result.records.length - 1];
    const meta: BatchMeta = {
        id: batchId,
        createdAt: result.generatedAt.toISOString(),
        seed: result.seed,
        firstLiveDate: result.firstLiveDate,
        lastLiveDate: lastRecord?.live_date ?? result.firstLiveDate,
        puzzleCount: result.records.length,
        dictionaryWords,
    };

    const summary: BatchSummary = {
        proposals: result.stats.proposals,
        evaluatorRejections: result.stats.evaluatorRejections,
        schedulerRejections: result.stats.scheduler.rejected,
        metCorrelationTarget: result.stats.metCorrelationTarget,
        analysis: analyzeBatch(result.records, repeatWindow),
        warnings: result.warnings,
    };

    // puzzles first: a batch only appears in listings once meta.json exists
    await writeArtifact(batchId, 'puzzles.json', result.records);
    await writeArtifact(batchId, 'summary.json', summary);
    await writeArtifact(batchId, 'meta.json', meta);
    console.log(`[Persistence] Saved batch ${batchId} (${result.records.length} puzzles)`);

    return { meta, summary };
}

/**
 * All stored batches, newest first.
 */
export async function listBatches(): Promise<BatchListItem[]> {
    await mkdir(getDataDir(), { recursive: true });
    const entries = await readdir(getDataDir());

    const items: BatchListItem[] = [];
    for (const entry of entries) {
        if (!isBatchId(entry)) continue;

        const meta = await readArtifact<BatchMeta>(entry, 'meta.json');
        const summary = await readArtifact<BatchSummary>(entry, 'summary.json');
        if (!meta || !summary) continue;

        items.push({
            id: meta.id,
            createdAt: meta.createdAt,
            firstLiveDate: meta.firstLiveDate,
            lastLiveDate: meta.lastLiveDate,
            puzzleCount: meta.puzzleCount,
            warning: summary.warnings[0],
        });
    }

    items.sort((a, b) => new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime());
    return items;
}

/**
 * Puzzle records of one batch, validated. Null when the batch does not exist.
 */
export async function getBatchPuzzles(batchId: string): Promise<PuzzleRecord[] | null> {
    if (!isBatchId(batchId)) return null;

    const raw = await readArtifact<unknown>(batchId, 'puzzles.json');
    if (raw === null) return null;
    return PuzzleRecordListSchema.parse(raw);
}

export async function getBatchBundle(batchId: string): Promise<BatchBundle | null> {
    if (!isBatchId(batchId)) return null;

    const meta = await readArtifact<BatchMeta>(batchId, 'meta.json');
    if (!meta) return null;

    const summary = await readArtifact<BatchSummary>(batchId, 'summary.json');
    const puzzles = await getBatchPuzzles(batchId);
    if (!summary || !puzzles) return null;

    return { meta, summary, puzzles };
}

/**
 * Every stored puzzle across all batches, by live date. Used as live history.
 */
export async function listAllPuzzles(): Promise<PuzzleRecord[]> {
    const batches = await listBatches();
    const puzzles: PuzzleRecord[] = [];
    for (const batch of batches) {
        puzzles.push(...((await getBatchPuzzles(batch.id)) ?? []));
    }
    return puzzles.sort((a, b) => a.live_date.localeCompare(b.live_date));
}

export async function batchExists(batchId: string): Promise<boolean> {
    if (!isBatchId(batchId)) return false;
    try {
        await stat(join(getBatchDir(batchId), 'meta.json'));
        return true;
    } catch (error) {
        if (isMissingFile(error)) return false;
        throw error;
    }
}
