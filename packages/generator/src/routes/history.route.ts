import type { FastifyInstance } from 'fastify';
import { getBatchBundle, getBatchPuzzles, listBatches } from '../services/persistence.service.js';

/**
 * Register history routes.
 */
export async function registerHistoryRoutes(fastify: FastifyInstance): Promise<void> {
    // List all batches
    fastify.get('/batches', async () => {
        const list = await listBatches();
        return {
            success: true,
            batches: list,
        };
    });

    // Get specific batch bundle
    fastify.get<{ Params: { id: string } }>('/batches/:id', async (request, reply) => {
        const bundle = await getBatchBundle(request.params.id);

        if (!bundle) {
            return reply.status(404).send({
                success: false,
                error: 'Batch not found',
            });
        }

        return {
            success: true,
            batch: bundle,
        };
    });

    // Puzzle records only, in live-date order
    fastify.get<{ Params: { id: string } }>('/batches/:id/puzzles', async (request, reply) => {
        const puzzles = await getBatchPuzzles(request.params.id);

        if (!puzzles) {
            return reply.status(404).send({
                success: false,
                error: 'Batch not found',
            });
        }

        return puzzles;
    });
}
