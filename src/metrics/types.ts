/**
 * Metrics Types
 */

import type { TokenUsage } from '@/pipeline/types';

export interface HistogramSnapshot {
    /** Cumulative counts: observations less than or equal to `le` seconds */
    buckets: Array<{ le: number; count: number }>;
    count: number;
    sum: number;
}

export interface MetricsSnapshot {
    requests: number;
    successes: number;
    failures: number;
    tokens: {
        prompt: number;
        completion: number;
        total: number;
    };
    latency: {
        pipeline: HistogramSnapshot;
        inference: HistogramSnapshot;
    };
}

/**
 * Sink for pipeline metrics. Implementations must never throw.
 */
export interface MetricsCollector {
    readonly enabled: boolean;
    recordRequest(): void;
    recordSuccess(): void;
    recordFailure(): void;
    recordTokenUsage(usage: Partial<TokenUsage>): void;
    /** Observe elapsed seconds since `startMs` (a Date.now() value); null when disabled */
    timePipeline(startMs: number): number | null;
    timeInference(startMs: number): number | null;
    snapshot(): MetricsSnapshot;
}
