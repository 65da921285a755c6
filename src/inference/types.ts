/**
 * Inference Types
 */

import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { PipelineConfig } from '@/config';
import type { Logger } from '@/logging';
import type { MetricsCollector } from '@/metrics';
import type { InferenceResult } from '@/pipeline/types';

/**
 * The part of the OpenAI client used for inference. An `OpenAI` instance
 * satisfies it; tests substitute a stub.
 */
export interface ChatClient {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
        };
    };
}

export type Sleep = (ms: number) => Promise<void>;

export type InferenceConfig = Pick<PipelineConfig, 'apiUrl' | 'apiKey' | 'model' | 'timeoutSeconds' | 'maxRetries'>;

export interface InferenceOptions {
    config: InferenceConfig;
    metrics: MetricsCollector;
    logger: Logger;
    /** Delay between attempts; defaults to a timer-based sleep */
    sleep?: Sleep;
    /** Prebuilt client; otherwise one is created on first use */
    client?: ChatClient;
}

export interface InferenceInstance {
    run(prompt: string): Promise<InferenceResult>;
}
