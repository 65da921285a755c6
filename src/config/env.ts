/**
 * Environment variable mapping.
 *
 * Hosts (the CLI and the HTTP server) call `fromEnv(process.env)` after
 * loading dotenv; the pipeline itself only ever sees a resolved config.
 */

import { isLogLevel } from '@/logging';
import type { PipelineConfigInput } from './schema';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export type Env = Record<string, string | undefined>;

const readString = (env: Env, key: string): string | undefined => {
    const value = env[key];
    return value !== undefined && value !== '' ? value : undefined;
};

const readInt = (env: Env, key: string): number | undefined => {
    const value = readString(env, key);
    if (value === undefined) {
        return undefined;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`);
    }
    return parsed;
};

/**
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
const readBool = (env: Env, key: string): boolean | undefined => {
    const value = readString(env, key);
    if (value === undefined) {
        return undefined;
    }
    const normalized = value.toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) {
        return true;
    }
    if (['false', '0', 'no'].includes(normalized)) {
        return false;
    }
    throw new ConfigError(`Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`);
};

const readLogLevel = (env: Env, key: string): PipelineConfigInput['logLevel'] => {
    const value = readString(env, key);
    if (value === undefined) {
        return undefined;
    }
    if (!isLogLevel(value)) {
        throw new ConfigError(`Environment variable ${key} must be a log level, got: ${value}`);
    }
    return value;
};

/**
 * Map environment variables onto a partial config. Unset variables stay
 * undefined, which the schema resolves to defaults.
 */
export const fromEnv = (env: Env): PipelineConfigInput => {
    return {
        apiUrl: readString(env, 'LLM_API_URL'),
        apiKey: readString(env, 'LLM_API_KEY'),
        model: readString(env, 'MODEL_NAME'),
        timeoutSeconds: readInt(env, 'TIMEOUT_SECONDS'),
        maxRetries: readInt(env, 'MAX_RETRIES'),
        stripInput: readBool(env, 'STRIP_INPUT'),
        lowercaseInput: readBool(env, 'LOWERCASE_INPUT'),
        uppercaseOutput: readBool(env, 'UPPERCASE_OUTPUT'),
        templateDir: readString(env, 'TEMPLATE_DIR'),
        defaultTemplate: readString(env, 'DEFAULT_TEMPLATE'),
        validateSchemas: readBool(env, 'VALIDATE_SCHEMAS'),
        collectMetrics: readBool(env, 'COLLECT_METRICS'),
        metricsPort: readInt(env, 'METRICS_PORT'),
        exposeMetrics: readBool(env, 'EXPOSE_METRICS'),
        logLevel: readLogLevel(env, 'LOG_LEVEL'),
    };
};
