/**
 * Stage 2: Prompt Composer
 *
 * Loads a named template and interpolates `{user_input}` and `{context}`.
 */

import type { Logger } from '@/logging';
import { PromptCompositionError } from '@/pipeline/errors';
import type { PreprocessedData } from '@/pipeline/types';
import type { LoaderInstance } from './template';
import { render } from './template';

export interface ComposerInstance {
    compose(data: Partial<PreprocessedData>, templateName?: string): Promise<string>;
}

export interface ComposerConfig {
    loader: LoaderInstance;
    defaultTemplate: string;
    logger: Logger;
}

const missingKey = (key: string): PromptCompositionError =>
    new PromptCompositionError(`Missing required key in preprocessed data: ${key}`);

export const create = (config: ComposerConfig): ComposerInstance => {
    const { loader, defaultTemplate, logger } = config;

    const compose = async (data: Partial<PreprocessedData>, templateName?: string): Promise<string> => {
        const input = data.input;
        if (input === undefined) {
            throw missingKey('input');
        }
        // An undefined context is legitimate; only an absent key is an error
        if (!('context' in data)) {
            throw missingKey('context');
        }

        const template = await loader.load(templateName ?? defaultTemplate);
        const prompt = render(template.source, { user_input: input, context: data.context }, template.name);

        logger.debug('Composed prompt: %s', prompt);
        return prompt;
    };

    return { compose };
};
