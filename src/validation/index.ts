/**
 * Envelope Validation
 *
 * Optional pass/fail gate before Stage 1 and after Stage 4.
 */

import type { ZodError } from 'zod';
import type { Logger } from '@/logging';
import { SchemaValidationError, type ValidationIssue } from '@/pipeline/errors';
import type { InputEnvelope, SuccessEnvelope } from '@/pipeline/types';
import { InputEnvelopeSchema, OutputEnvelopeSchema } from './schemas';

export interface ValidatorInstance {
    validateInput(envelope: InputEnvelope): InputEnvelope;
    validateOutput(envelope: SuccessEnvelope): SuccessEnvelope;
}

const toIssues = (error: ZodError): ValidationIssue[] =>
    error.issues.map(issue => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
    }));

export const create = (logger?: Logger): ValidatorInstance => {
    const validateInput = (envelope: InputEnvelope): InputEnvelope => {
        const parsed = InputEnvelopeSchema.safeParse(envelope);
        if (!parsed.success) {
            const error = new SchemaValidationError('input', toIssues(parsed.error));
            logger?.error('Input validation error: %s', error.message);
            throw error;
        }
        return { ...parsed.data, inputText: parsed.data.inputText, context: parsed.data.context };
    };

    const validateOutput = (envelope: SuccessEnvelope): SuccessEnvelope => {
        const parsed = OutputEnvelopeSchema.safeParse(envelope);
        if (!parsed.success) {
            const error = new SchemaValidationError('output', toIssues(parsed.error));
            logger?.error('Output validation error: %s', error.message);
            throw error;
        }
        const { finalOutput, contextUsed, timestamp, tokenUsage } = parsed.data;
        return { ...parsed.data, finalOutput, contextUsed, timestamp, tokenUsage };
    };

    return { validateInput, validateOutput };
};

export const createNoop = (): ValidatorInstance => ({
    validateInput: (envelope) => envelope,
    validateOutput: (envelope) => envelope,
});

export { InputEnvelopeSchema, OutputEnvelopeSchema, TokenUsageSchema } from './schemas';
