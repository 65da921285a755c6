/**
 * Inference Client
 *
 * Stage 3. Sends the composed prompt to a chat-completions endpoint with
 * bounded retries and exponential backoff (1s, 2s, 4s, ...). Without an
 * API key it answers from the mock instead of calling out.
 */

import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { setTimeout as delay } from 'node:timers/promises';
import { DEFAULT_SYSTEM_PROMPT } from '@/constants';
import {
    InferenceError,
    InferenceProtocolError,
    InferenceTransportError,
    describeError,
} from '@/pipeline/errors';
import type { InferenceResult, TokenUsage } from '@/pipeline/types';
import * as Mock from './mock';
import type { ChatClient, InferenceConfig, InferenceInstance, InferenceOptions, Sleep } from './types';

type AttemptFailure =
    | { kind: 'protocol'; status: number; detail: string }
    | { kind: 'transport'; detail: string };

class MalformedResponseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedResponseError';
    }
}

const defaultSleep: Sleep = async (ms) => {
    await delay(ms);
};

/** The SDK appends `/chat/completions` itself. */
export const toBaseUrl = (apiUrl: string): string =>
    apiUrl.replace(/\/+$/, '').replace(/\/chat\/completions$/, '');

export const backoffDelayMs = (attempt: number): number => 2 ** attempt * 1000;

/** Client errors other than timeouts and rate limits fail the same way on every attempt. */
export const isRetryableStatus = (status: number): boolean =>
    status === 408 || status === 429 || status >= 500;

export const buildRequest = (model: string, prompt: string): ChatCompletionCreateParamsNonStreaming => ({
    model,
    messages: [
        { role: 'system', content: DEFAULT_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
    ],
});

const classify = (error: unknown): AttemptFailure => {
    if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
        return { kind: 'protocol', status: error.status, detail: error.message };
    }
    return { kind: 'transport', detail: describeError(error) };
};

const toUsage = (completion: ChatCompletion): TokenUsage | null => {
    if (!completion.usage) {
        return null;
    }
    return {
        promptTokens: completion.usage.prompt_tokens,
        completionTokens: completion.usage.completion_tokens,
        totalTokens: completion.usage.total_tokens,
    };
};

const extract = (completion: ChatCompletion): InferenceResult => {
    const message = completion.choices?.[0]?.message;
    if (!message) {
        throw new MalformedResponseError('Malformed response body: missing choices[0].message');
    }
    return { content: message.content, usage: toUsage(completion) };
};

export const createClient = (config: InferenceConfig): ChatClient =>
    new OpenAI({
        apiKey: config.apiKey,
        baseURL: toBaseUrl(config.apiUrl),
        timeout: config.timeoutSeconds * 1000,
        // Retries are handled here so every attempt is logged and counted
        maxRetries: 0,
    });

export const create = (options: InferenceOptions): InferenceInstance => {
    const { config, metrics, logger } = options;
    const sleep = options.sleep ?? defaultSleep;

    let client: ChatClient | null = options.client ?? null;
    const getClient = (): ChatClient => {
        if (!client) {
            client = createClient(config);
        }
        return client;
    };

    const run = async (prompt: string): Promise<InferenceResult> => {
        if (!prompt) {
            throw new InferenceError('Cannot run inference with empty prompt');
        }

        if (!config.apiKey) {
            logger.warn('Using mock LLM response (no API key provided)');
            return Mock.respond(prompt);
        }

        const inferenceStart = Date.now();
        const request = buildRequest(config.model, prompt);
        const maxAttempts = config.maxRetries;
        let lastStatus: number | null = null;

        for (let attempt = 0; attempt < maxAttempts; attempt++) {
            const isLastAttempt = attempt === maxAttempts - 1;

            try {
                logger.debug('Inference attempt %d/%d to %s', attempt + 1, maxAttempts, config.apiUrl);
                const completion = await getClient().chat.completions.create(request);
                const result = extract(completion);

                if (result.usage) {
                    metrics.recordTokenUsage(result.usage);
                }
                metrics.timeInference(inferenceStart);

                return result;
            } catch (error) {
                const failure = classify(error);

                if (failure.kind === 'protocol') {
                    lastStatus = failure.status;
                    logger.error('API error: %d, %s', failure.status, failure.detail);
                    if (!isRetryableStatus(failure.status)) {
                        throw new InferenceProtocolError(
                            `Inference failed: endpoint returned status ${failure.status} after ${attempt + 1} attempt(s)`,
                            attempt + 1,
                            failure.status,
                        );
                    }
                } else {
                    logger.error('Request failed (attempt %d/%d): %s', attempt + 1, maxAttempts, failure.detail);
                    if (isLastAttempt) {
                        throw new InferenceTransportError(
                            `Failed to get response after ${maxAttempts} attempts`,
                            maxAttempts,
                            error,
                        );
                    }
                }

                if (!isLastAttempt) {
                    const waitMs = backoffDelayMs(attempt);
                    logger.debug('Retrying inference in %dms', waitMs);
                    await sleep(waitMs);
                }
            }
        }

        throw new InferenceProtocolError(
            `Inference failed: endpoint returned status ${lastStatus ?? 'unknown'} after ${maxAttempts} attempt(s)`,
            maxAttempts,
            lastStatus,
        );
    };

    return { run };
};
