/**
 * Pipeline Types
 *
 * Envelopes passed between hooks and stages, and the result shapes
 * returned to callers.
 */

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

/** Built per `process` call; pre-hooks may change any field. */
export interface InputEnvelope {
    inputText: string;
    context: unknown;
    [key: string]: unknown;
}

export interface PreprocessedData {
    input: string;
    context: unknown;
}

export interface InferenceResult {
    content: string | null;
    usage: TokenUsage | null;
}

export interface SuccessEnvelope {
    finalOutput: string;
    contextUsed: unknown;
    /** Completion time, seconds since the epoch */
    timestamp: number;
    tokenUsage: TokenUsage | null;
    [key: string]: unknown;
}

export interface FailureEnvelope {
    error: string;
    input?: unknown;
    context?: unknown;
    status: 'failed';
}

export type ResultEnvelope = SuccessEnvelope | FailureEnvelope;

export const isFailure = (result: ResultEnvelope): result is FailureEnvelope =>
    'status' in result && result.status === 'failed' && typeof result.error === 'string';
