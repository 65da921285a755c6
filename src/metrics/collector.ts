/**
 * Metrics Collector
 *
 * In-memory counters and latency histograms for the pipeline. One
 * collector is shared by every call on a pipeline instance.
 */

import { LATENCY_BUCKETS_SECONDS } from '@/constants';
import type { Logger } from '@/logging';
import type { TokenUsage } from '@/pipeline/types';
import type { HistogramSnapshot, MetricsCollector, MetricsSnapshot } from './types';

interface Histogram {
    observe(value: number): void;
    snapshot(): HistogramSnapshot;
}

const createHistogram = (bounds: readonly number[]): Histogram => {
    const counts = bounds.map(() => 0);
    let count = 0;
    let sum = 0;

    return {
        observe: (value) => {
            count++;
            sum += value;
            bounds.forEach((le, index) => {
                if (value <= le) {
                    counts[index]++;
                }
            });
        },
        snapshot: () => ({
            buckets: bounds.map((le, index) => ({ le, count: counts[index] })),
            count,
            sum,
        }),
    };
};

const emptyHistogram = (bounds: readonly number[]): HistogramSnapshot => ({
    buckets: bounds.map(le => ({ le, count: 0 })),
    count: 0,
    sum: 0,
});

const elapsedSeconds = (startMs: number): number => Math.max(0, Date.now() - startMs) / 1000;

export const create = (logger?: Logger): MetricsCollector => {
    let requests = 0;
    let successes = 0;
    let failures = 0;
    let promptTokens = 0;
    let completionTokens = 0;
    let totalTokens = 0;

    const pipelineLatency = createHistogram(LATENCY_BUCKETS_SECONDS);
    const inferenceLatency = createHistogram(LATENCY_BUCKETS_SECONDS);

    const recordTokenUsage = (usage: Partial<TokenUsage>) => {
        const prompt = usage.promptTokens ?? 0;
        const completion = usage.completionTokens ?? 0;
        const total = usage.totalTokens ?? 0;

        promptTokens += prompt;
        completionTokens += completion;
        totalTokens += total;

        logger?.debug('Token usage - Prompt: %d, Completion: %d, Total: %d', prompt, completion, total);
    };

    const timePipeline = (startMs: number): number => {
        const seconds = elapsedSeconds(startMs);
        pipelineLatency.observe(seconds);
        return seconds;
    };

    const timeInference = (startMs: number): number => {
        const seconds = elapsedSeconds(startMs);
        inferenceLatency.observe(seconds);
        return seconds;
    };

    const snapshot = (): MetricsSnapshot => ({
        requests,
        successes,
        failures,
        tokens: {
            prompt: promptTokens,
            completion: completionTokens,
            total: totalTokens,
        },
        latency: {
            pipeline: pipelineLatency.snapshot(),
            inference: inferenceLatency.snapshot(),
        },
    });

    return {
        enabled: true,
        recordRequest: () => { requests++; },
        recordSuccess: () => { successes++; },
        recordFailure: () => { failures++; },
        recordTokenUsage,
        timePipeline,
        timeInference,
        snapshot,
    };
};

export const createNoop = (): MetricsCollector => ({
    enabled: false,
    recordRequest: () => undefined,
    recordSuccess: () => undefined,
    recordFailure: () => undefined,
    recordTokenUsage: () => undefined,
    timePipeline: () => null,
    timeInference: () => null,
    snapshot: () => ({
        requests: 0,
        successes: 0,
        failures: 0,
        tokens: { prompt: 0, completion: 0, total: 0 },
        latency: {
            pipeline: emptyHistogram(LATENCY_BUCKETS_SECONDS),
            inference: emptyHistogram(LATENCY_BUCKETS_SECONDS),
        },
    }),
});
