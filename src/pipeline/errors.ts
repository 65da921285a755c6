/**
 * Pipeline Errors
 *
 * Every failure the pipeline knows how to describe is a PipelineError.
 * The orchestrator reports these with their message; anything else is
 * treated as internal and reported without detail.
 */

export type PipelineErrorKind =
    | 'input'
    | 'composition'
    | 'inference'
    | 'transport'
    | 'protocol'
    | 'output'
    | 'validation'
    | 'hook';

export class PipelineError extends Error {
    readonly kind: PipelineErrorKind;

    constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineError';
        this.kind = kind;
    }
}

/** Raw input had the wrong type. */
export class InputShapeError extends PipelineError {
    constructor(message: string) {
        super('input', message);
        this.name = 'InputShapeError';
    }
}

export class PromptCompositionError extends PipelineError {
    constructor(message: string) {
        super('composition', message);
        this.name = 'PromptCompositionError';
    }
}

/** Inference could not start (e.g. an empty prompt). */
export class InferenceError extends PipelineError {
    constructor(message: string) {
        super('inference', message);
        this.name = 'InferenceError';
    }
}

/** Connection, timeout or unparseable response on every attempt. */
export class InferenceTransportError extends PipelineError {
    readonly attempts: number;

    constructor(message: string, attempts: number, cause?: unknown) {
        super('transport', message, { cause });
        this.name = 'InferenceTransportError';
        this.attempts = attempts;
    }
}

/** The endpoint kept answering with a non-success status. */
export class InferenceProtocolError extends PipelineError {
    readonly attempts: number;
    readonly status: number | null;

    constructor(message: string, attempts: number, status: number | null) {
        super('protocol', message);
        this.name = 'InferenceProtocolError';
        this.attempts = attempts;
        this.status = status;
    }
}

export class OutputShapeError extends PipelineError {
    constructor(message: string) {
        super('output', message);
        this.name = 'OutputShapeError';
    }
}

export interface ValidationIssue {
    path: string;
    message: string;
}

export class SchemaValidationError extends PipelineError {
    readonly stage: 'input' | 'output';
    readonly issues: ValidationIssue[];

    constructor(stage: 'input' | 'output', issues: ValidationIssue[]) {
        const detail = issues.map(issue => `${issue.path}: ${issue.message}`).join('; ');
        super('validation', `${stage === 'input' ? 'Input' : 'Output'} validation failed: ${detail}`);
        this.name = 'SchemaValidationError';
        this.stage = stage;
        this.issues = issues;
    }
}

export class HookError extends PipelineError {
    readonly phase: 'pre' | 'post';
    readonly hookName: string;

    constructor(phase: 'pre' | 'post', hookName: string, detail: string, cause?: unknown) {
        super('hook', `${phase}-hook "${hookName}" failed: ${detail}`, { cause });
        this.name = 'HookError';
        this.phase = phase;
        this.hookName = hookName;
    }
}

export const isPipelineError = (value: unknown): value is PipelineError =>
    value instanceof PipelineError;

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
