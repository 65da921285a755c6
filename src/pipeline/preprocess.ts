/**
 * Stage 1: Input Preprocessing
 *
 * Normalizes raw text according to config. Strip runs before lowercase.
 */

import type { PipelineConfig } from '@/config';
import type { Logger } from '@/logging';
import { InputShapeError } from './errors';
import type { PreprocessedData } from './types';

export interface PreprocessInstance {
    run(inputText: unknown, context: unknown): PreprocessedData;
}

export const describeType = (value: unknown): string => {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
};

export const create = (
    config: Pick<PipelineConfig, 'stripInput' | 'lowercaseInput'>,
    logger: Logger,
): PreprocessInstance => {
    const run = (inputText: unknown, context: unknown): PreprocessedData => {
        if (typeof inputText !== 'string') {
            throw new InputShapeError(`Input must be a string, got ${describeType(inputText)}`);
        }

        let processed = inputText;
        if (config.stripInput) {
            processed = processed.trim();
        }
        if (config.lowercaseInput) {
            processed = processed.toLowerCase();
        }

        logger.debug('Preprocessed input: \'%s\'', processed);
        return { input: processed, context };
    };

    return { run };
};
