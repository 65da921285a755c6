/**
 * Pipeline Configuration Schema
 *
 * One flat record of tunables. Every field has a default, so an empty
 * object resolves to a working (mock-inference) configuration.
 */

import { z } from 'zod';
import {
    DEFAULT_API_URL,
    DEFAULT_COLLECT_METRICS,
    DEFAULT_EXPOSE_METRICS,
    DEFAULT_LOWERCASE_INPUT,
    DEFAULT_MAX_RETRIES,
    DEFAULT_METRICS_PORT,
    DEFAULT_MODEL,
    DEFAULT_STRIP_INPUT,
    DEFAULT_TEMPLATE,
    DEFAULT_TEMPLATE_DIR,
    DEFAULT_TIMEOUT_SECONDS,
    DEFAULT_UPPERCASE_OUTPUT,
    DEFAULT_VALIDATE_SCHEMAS,
} from '@/constants';

export const PipelineConfigSchema = z.object({
    // Remote endpoint
    apiUrl: z.string().url().default(DEFAULT_API_URL),
    apiKey: z.string().default(''),
    model: z.string().min(1).default(DEFAULT_MODEL),
    timeoutSeconds: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
    maxRetries: z.number().int().min(1).default(DEFAULT_MAX_RETRIES),

    // Text normalization
    stripInput: z.boolean().default(DEFAULT_STRIP_INPUT),
    lowercaseInput: z.boolean().default(DEFAULT_LOWERCASE_INPUT),
    uppercaseOutput: z.boolean().default(DEFAULT_UPPERCASE_OUTPUT),

    // Templates
    templateDir: z.string().min(1).default(DEFAULT_TEMPLATE_DIR),
    defaultTemplate: z.string().min(1).default(DEFAULT_TEMPLATE),

    // Collaborators
    validateSchemas: z.boolean().default(DEFAULT_VALIDATE_SCHEMAS),
    collectMetrics: z.boolean().default(DEFAULT_COLLECT_METRICS),
    metricsPort: z.number().int().min(1).max(65535).default(DEFAULT_METRICS_PORT),
    exposeMetrics: z.boolean().default(DEFAULT_EXPOSE_METRICS),

    logLevel: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),
});

export type PipelineConfig = Readonly<z.infer<typeof PipelineConfigSchema>>;

/** Partial configuration as accepted from callers and hosts. */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
