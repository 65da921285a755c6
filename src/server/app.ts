/**
 * HTTP front-end
 *
 * Hono application around one shared pipeline instance.
 *
 *   GET  /health   liveness
 *   POST /process  run the pipeline: { inputText, context?, templateName? }
 *
 * Metrics are served by a separate app on their own port.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import * as Logging from '@/logging';
import type { PipelineInstance } from '@/pipeline';
import { isFailure } from '@/pipeline';

export const ProcessRequestSchema = z.object({
    inputText: z.string(),
    context: z.unknown().optional(),
    templateName: z.string().min(1).optional(),
});

export type ProcessRequest = z.infer<typeof ProcessRequestSchema>;

export interface AppOptions {
    logger?: Logging.Logger;
}

export const createApp = (pipeline: PipelineInstance, options: AppOptions = {}): Hono => {
    const logger = options.logger ?? Logging.getLogger();
    let requestCounter = 0;

    const nextRequestId = (): string => {
        requestCounter++;
        return `req_${Math.floor(Date.now() / 1000)}_${requestCounter}`;
    };

    const app = new Hono();

    app.use('*', cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Content-Type'],
    }));

    // Request timing, in seconds
    app.use('*', async (c, next) => {
        const start = performance.now();
        await next();
        c.res.headers.set('X-Process-Time', String((performance.now() - start) / 1000));
    });

    app.get('/health', (c) => c.json({ status: 'ok', timestamp: Date.now() / 1000 }));

    app.post('/process', async (c) => {
        const requestId = nextRequestId();

        let payload: unknown;
        try {
            payload = await c.req.json();
        } catch {
            return c.json({ error: 'Request body must be valid JSON', requestId, status: 'failed' }, 400);
        }

        const parsed = ProcessRequestSchema.safeParse(payload);
        if (!parsed.success) {
            const detail = parsed.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            return c.json({ error: `Invalid request: ${detail}`, requestId, status: 'failed' }, 400);
        }

        const { inputText, context, templateName } = parsed.data;
        logger.info('Received request %s: %s...', requestId, inputText.slice(0, 50));

        const start = performance.now();
        const result = await pipeline.process(inputText, context, templateName);
        const processingTimeMs = performance.now() - start;

        if (isFailure(result)) {
            logger.error('Request %s failed: %s', requestId, result.error);
            return c.json({ error: result.error, requestId, status: 'failed' }, 500);
        }

        logger.info('Request %s completed in %sms', requestId, processingTimeMs.toFixed(2));
        return c.json({
            output: result.finalOutput,
            requestId,
            processingTimeMs,
            tokenUsage: result.tokenUsage,
            status: 'success',
        });
    });

    app.onError((error, c) => {
        logger.error('Unhandled exception: %s', error.message, { stack: error.stack });
        return c.json({ error: 'Internal server error', status: 'error' }, 500);
    });

    return app;
};

/**
 * `GET /metrics` with the pipeline's metrics snapshot. Answers 404 when
 * collection is switched off.
 */
export const createMetricsApp = (pipeline: PipelineInstance): Hono => {
    const app = new Hono();

    app.get('/metrics', (c) => {
        if (!pipeline.metrics.enabled) {
            return c.json({ error: 'Metrics collection is disabled', status: 'failed' }, 404);
        }
        return c.json(pipeline.metrics.snapshot());
    });

    return app;
};
