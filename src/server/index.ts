/**
 * HTTP server bootstrap.
 */

import { serve } from '@hono/node-server';
import * as Logging from '@/logging';
import type { PipelineInstance } from '@/pipeline';
import { createApp, createMetricsApp, type AppOptions } from './app';

export interface ServerOptions extends AppOptions {
    port: number;
    host: string;
}

export type Server = ReturnType<typeof serve>;

export const start = (pipeline: PipelineInstance, options: ServerOptions): Server => {
    const logger = options.logger ?? Logging.getLogger();
    const app = createApp(pipeline, options);

    return serve({
        fetch: app.fetch,
        port: options.port,
        hostname: options.host,
    }, (info) => {
        logger.info('Listening on http://%s:%d', options.host, info.port);
    });
};

/** Metrics listener, bound to `config.metricsPort` by the CLI when `exposeMetrics` is on. */
export const startMetrics = (pipeline: PipelineInstance, options: ServerOptions): Server => {
    const logger = options.logger ?? Logging.getLogger();
    const app = createMetricsApp(pipeline);

    return serve({
        fetch: app.fetch,
        port: options.port,
        hostname: options.host,
    }, (info) => {
        logger.info('Metrics server started on http://%s:%d/metrics', options.host, info.port);
    });
};

export { createApp, createMetricsApp, ProcessRequestSchema, type AppOptions, type ProcessRequest } from './app';
