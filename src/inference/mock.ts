/**
 * Development-mode inference used when no API key is configured.
 * Deterministic and offline.
 */

import { MOCK_COMPLETION_TOKENS, MOCK_PROMPT_PREVIEW_LENGTH, MOCK_RESPONSE_PREFIX } from '@/constants';
import type { InferenceResult } from '@/pipeline/types';

export const countWords = (text: string): number =>
    text.split(/\s+/).filter(word => word.length > 0).length;

export const respond = (prompt: string): InferenceResult => {
    const promptTokens = countWords(prompt);
    return {
        content: `${MOCK_RESPONSE_PREFIX}${prompt.slice(0, MOCK_PROMPT_PREVIEW_LENGTH)}...`,
        usage: {
            promptTokens,
            completionTokens: MOCK_COMPLETION_TOKENS,
            totalTokens: promptTokens + MOCK_COMPLETION_TOKENS,
        },
    };
};
