/**
 * Fastify server for the puzzle batch generator API.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { getDataDirDebugInfo, isProduction } from './config/data-dir.js';
import { isGenerationError } from './errors.js';
import { registerGenerateRoutes, type GeneratorContext } from './routes/generate.route.js';
import { registerHistoryRoutes } from './routes/history.route.js';

export interface ServerOptions {
    logger?: boolean;
}

/**
 * Create and configure the Fastify server.
 */
export async function createServer(context: GeneratorContext, options: ServerOptions = {}): Promise<FastifyInstance> {
    const fastify = Fastify({
        logger: options.logger ?? true,
    });

    await fastify.register(cors, {
        origin: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
    });

    fastify.setErrorHandler(async (error, _request, reply) => {
        if (error instanceof ZodError) {
            const message = error.issues
                .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
                .join('; ');
            return reply.status(400).send({ success: false, error: message });
        }
        if (isGenerationError(error)) {
            console.error(`[API] ${error.code}: ${error.message}`);
            return reply.status(422).send({ success: false, error: error.message, code: error.code, details: error.details });
        }
        if (error.validation) {
            return reply.status(400).send({ success: false, error: error.message });
        }

        console.error('[API] Error:', error);
        return reply.status(500).send({ success: false, error: error.message || 'Internal Server Error' });
    });

    fastify.get('/health', async () => ({
        status: 'ok',
        dictionaryWords: context.index.size,
        timestamp: new Date().toISOString(),
    }));

    await registerGenerateRoutes(fastify, context);
    await registerHistoryRoutes(fastify);

    if (!isProduction()) {
        fastify.get('/_debug/data-dir', async () => {
            const info = getDataDirDebugInfo();
            if (!info) {
                return { error: 'Not available in production' };
            }
            return info;
        });
    }

    return fastify;
}
