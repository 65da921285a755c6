/**
 * Pipeline Configuration
 *
 * Resolves partial input (caller options, environment, CLI flags) into a
 * frozen PipelineConfig. Resolution happens once, before a pipeline is built.
 */

import { ConfigError } from './env';
import { PipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from './schema';

export const resolve = (input: PipelineConfigInput = {}): PipelineConfig => {
    const parsed = PipelineConfigSchema.safeParse(input);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid pipeline configuration: ${problems}`);
    }
    return Object.freeze(parsed.data);
};

export { ConfigError, fromEnv, type Env } from './env';
export { PipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from './schema';
