/**
 * Stage 4: Output Postprocessing
 */

import type { PipelineConfig } from '@/config';
import { OutputShapeError } from './errors';
import { describeType } from './preprocess';
import type { InferenceResult, SuccessEnvelope, TokenUsage } from './types';

export interface PostprocessInstance {
    run(result: InferenceResult, context: unknown): SuccessEnvelope;
}

const hasUsage = (usage: TokenUsage | null | undefined): usage is TokenUsage =>
    usage !== null && usage !== undefined && Object.keys(usage).length > 0;

export const create = (config: Pick<PipelineConfig, 'uppercaseOutput'>): PostprocessInstance => {
    const run = (result: InferenceResult, context: unknown): SuccessEnvelope => {
        const output: unknown = result.content;
        if (typeof output !== 'string') {
            throw new OutputShapeError(`Output must be a string, got ${describeType(output)}`);
        }

        return {
            finalOutput: config.uppercaseOutput ? output.toUpperCase() : output,
            contextUsed: context,
            timestamp: Date.now() / 1000,
            tokenUsage: hasUsage(result.usage) ? result.usage : null,
        };
    };

    return { run };
};
