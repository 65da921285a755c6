/**
 * prompt-relay
 *
 * Middleware pipeline around a text generation endpoint:
 * preprocess -> compose prompt -> inference (retry, backoff, mock) -> postprocess,
 * with pre/post hooks, optional validation and metrics.
 */

export * as Config from './config';
export * as Hooks from './hooks';
export * as Inference from './inference';
export * as Metrics from './metrics';
export * as Prompt from './prompt';
export * as Validation from './validation';
export * as Server from './server';
export { getLogger, setLogLevel, type Logger, type LogLevel } from './logging';
export {
    create as createPipeline,
    isFailure,
    type PipelineInstance,
    type PipelineOptions,
    type InputEnvelope,
    type SuccessEnvelope,
    type FailureEnvelope,
    type ResultEnvelope,
    type TokenUsage,
    type InferenceResult,
    type PreprocessedData,
} from './pipeline';
export * from './pipeline/errors';
