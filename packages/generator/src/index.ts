/**
 * Server entry point for the puzzle batch generator API.
 */

import { loadConfigFromEnv } from './config/generator-config.js';
import { initializeDataDir, isProduction } from './config/data-dir.js';
import { loadDictionary } from './services/dictionary.service.js';
import { createServer } from './server.js';

const PORT = parseInt(process.env['PORT'] ?? '3001', 10);
const HOST = process.env['HOST'] ?? '0.0.0.0';
const DICTIONARY_PATH = process.env['DICTIONARY_PATH'] ?? 'data/dictionary.json';
const WORD_CACHE_PATH = process.env['WORD_CACHE_PATH'];

/**
 * Start the server.
 */
async function start(): Promise<void> {
    try {
        // Fail fast on an unusable data directory, config or dictionary
        initializeDataDir();
        const config = loadConfigFromEnv();
        const { index } = await loadDictionary(DICTIONARY_PATH, { wordCachePath: WORD_CACHE_PATH });

        const fastify = await createServer({ index, config });
        await fastify.listen({ port: PORT, host: HOST });

        console.log(`\n📦 Puzzle Batch Generator API`);
        console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
        console.log(`🚀 Server running at http://${HOST}:${PORT}`);
        console.log(`📖 Dictionary: ${DICTIONARY_PATH} (${index.size} words)`);
        console.log(`📋 API Endpoints:`);
        console.log(`   GET  /health`);
        console.log(`   POST /batches`);
        console.log(`   GET  /batches`);
        console.log(`   GET  /batches/:id`);
        console.log(`   GET  /batches/:id/puzzles`);
        console.log(`   POST /puzzles/custom`);
        if (!isProduction()) {
            console.log(`   GET  /_debug/data-dir (dev-only)`);
        }
        console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

void start();
