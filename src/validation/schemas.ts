/**
 * Envelope Schemas
 *
 * Unknown keys pass through so fields added by hooks survive validation.
 */

import { z } from 'zod';

const nonBlank = (field: string) =>
    z.string().refine(value => value.trim().length > 0, { message: `${field} cannot be empty` });

export const TokenUsageSchema = z.object({
    promptTokens: z.number().int().nonnegative(),
    completionTokens: z.number().int().nonnegative(),
    totalTokens: z.number().int().nonnegative(),
});

export const InputEnvelopeSchema = z.object({
    inputText: nonBlank('inputText'),
    context: z.unknown(),
}).passthrough();

export const OutputEnvelopeSchema = z.object({
    finalOutput: nonBlank('finalOutput'),
    contextUsed: z.unknown(),
    timestamp: z.number(),
    tokenUsage: TokenUsageSchema.nullable(),
}).passthrough();
