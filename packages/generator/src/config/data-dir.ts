/**
 * Data directory configuration utility.
 *
 * Resolves the batch data directory with:
 * 1. Environment variable override (PUZZLE_DATA_DIR)
 * 2. Fallback to repo-root/data/batches
 *
 * Monorepo-safe: walks up directory tree to find repo root.
 */

import { existsSync, mkdirSync, readFileSync, statSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

/**
 * Cached resolved data directory.
 */
let resolvedDataDir: string | null = null;

function hasWorkspaces(packageJsonPath: string): boolean {
    try {
        const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
        return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
    } catch {
        return false;
    }
}

/**
 * Find the repository root by walking up the directory tree.
 * Looks for a .git directory or a package.json with a "workspaces" field.
 */
function findRepoRoot(startDir: string): string {
    let currentDir = resolve(startDir);

    while (true) {
        const gitDir = join(currentDir, '.git');
        if (existsSync(gitDir) && statSync(gitDir).isDirectory()) {
            return currentDir;
        }

        const packageJsonPath = join(currentDir, 'package.json');
        if (existsSync(packageJsonPath) && hasWorkspaces(packageJsonPath)) {
            return currentDir;
        }

        const parentDir = dirname(currentDir);
        if (parentDir === currentDir) break;
        currentDir = parentDir;
    }

    console.warn('[Config] Could not find repo root, using start directory');
    return startDir;
}

/**
 * Resolve the batch data directory.
 *
 * @returns Absolute path to data directory
 */
export function resolveDataDir(): string {
    if (resolvedDataDir) {
        return resolvedDataDir;
    }

    const envDataDir = process.env['PUZZLE_DATA_DIR'];
    if (envDataDir) {
        resolvedDataDir = resolve(envDataDir);
        return resolvedDataDir;
    }

    const currentDir = dirname(fileURLToPath(import.meta.url));
    resolvedDataDir = join(findRepoRoot(currentDir), 'data', 'batches');
    return resolvedDataDir;
}

export function getDataDir(): string {
    return resolvedDataDir ?? resolveDataDir();
}

/**
 * Forget the cached directory so the next lookup re-reads PUZZLE_DATA_DIR.
 */
export function resetDataDir(): void {
    resolvedDataDir = null;
}

/**
 * Create the data directory if needed and log where it is.
 *
 * @throws Error if the directory cannot be created
 */
export function initializeDataDir(): string {
    const dataDir = resolveDataDir();

    try {
        mkdirSync(dataDir, { recursive: true });
    } catch (error) {
        console.error(`[Config] FATAL: Failed to initialize data directory: ${dataDir}`);
        throw error;
    }

    console.log(`📁 Puzzle data directory: ${dataDir}`);
    return dataDir;
}

export function isProduction(): boolean {
    return process.env['NODE_ENV'] === 'production';
}

/**
 * Debug info about the data directory. Only available in non-production.
 */
export function getDataDirDebugInfo(): { dataDir: string; exists: boolean } | null {
    if (isProduction()) {
        return null;
    }

    const dataDir = getDataDir();
    return {
        dataDir,
        exists: existsSync(dataDir),
    };
}
