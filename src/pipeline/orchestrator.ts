/**
 * Pipeline Orchestrator
 *
 * Runs one request through pre-hooks, input validation, the four stages,
 * output validation and post-hooks. `process` always resolves to an
 * envelope: PipelineErrors are reported with their message, anything else
 * as an internal error with the detail kept in the logs.
 */

import * as Config from '@/config';
import { INTERNAL_ERROR_MESSAGE } from '@/constants';
import * as Hooks from '@/hooks';
import * as Inference from '@/inference';
import * as Logging from '@/logging';
import * as Metrics from '@/metrics';
import * as Prompt from '@/prompt';
import * as Validation from '@/validation';
import { describeError, isPipelineError } from './errors';
import * as Postprocess from './postprocess';
import * as Preprocess from './preprocess';
import type {
    FailureEnvelope,
    InferenceResult,
    InputEnvelope,
    PreprocessedData,
    ResultEnvelope,
    SuccessEnvelope,
} from './types';

export interface PipelineOptions {
    logger?: Logging.Logger;
    metrics?: Metrics.MetricsCollector;
    validation?: Validation.ValidatorInstance;
    templates?: Prompt.LoaderInstance;
    /** Replaces Stage 3 entirely */
    inference?: Inference.InferenceInstance;
    client?: Inference.ChatClient;
    sleep?: Inference.Sleep;
}

export interface PipelineInstance {
    readonly config: Config.PipelineConfig;
    readonly metrics: Metrics.MetricsCollector;
    process(inputText: string, context?: unknown, templateName?: string): Promise<ResultEnvelope>;
    addPreHook(hook: Hooks.HookLike<InputEnvelope>): Hooks.Hook<InputEnvelope>;
    addPostHook(hook: Hooks.HookLike<SuccessEnvelope>): Hooks.Hook<SuccessEnvelope>;
    removePreHook(index: number): Hooks.Hook<InputEnvelope> | undefined;
    removePostHook(index: number): Hooks.Hook<SuccessEnvelope> | undefined;
    preprocess(inputText: unknown, context: unknown): PreprocessedData;
    composePrompt(data: Partial<PreprocessedData>, templateName?: string): Promise<string>;
    runInference(prompt: string): Promise<InferenceResult>;
    postprocess(result: InferenceResult, context: unknown): SuccessEnvelope;
}

const timed = async <T>(logger: Logging.Logger, stage: string, fn: () => T | Promise<T>): Promise<T> => {
    const start = performance.now();
    const result = await fn();
    logger.debug('%s executed in %sms', stage, (performance.now() - start).toFixed(2));
    return result;
};

/**
 * A result must stay a success envelope through the post-hooks:
 * text output and no failure fields.
 */
export const checkSuccessEnvelope = (envelope: SuccessEnvelope): string | null => {
    if (typeof envelope.finalOutput !== 'string') {
        return 'hook result has no text finalOutput';
    }
    if ('error' in envelope || envelope.status === 'failed') {
        return 'hook result carries failure fields';
    }
    return null;
};

const preview = (value: unknown): string =>
    typeof value === 'string' ? value.slice(0, 50) : `<${typeof value}>`;

export const create = (
    configInput: Config.PipelineConfigInput = {},
    options: PipelineOptions = {},
): PipelineInstance => {
    const config = Config.resolve(configInput);
    const logger = options.logger ?? Logging.getLogger();

    const metrics = options.metrics
        ?? (config.collectMetrics ? Metrics.create(logger) : Metrics.createNoop());
    const validation = options.validation
        ?? (config.validateSchemas ? Validation.create(logger) : Validation.createNoop());

    const preprocessor = Preprocess.create(config, logger);
    const composer = Prompt.createComposer({
        loader: options.templates ?? Prompt.createLoader({ templateDir: config.templateDir, logger }),
        defaultTemplate: config.defaultTemplate,
        logger,
    });
    const inference = options.inference ?? Inference.create({
        config,
        metrics,
        logger,
        sleep: options.sleep,
        client: options.client,
    });
    const postprocessor = Postprocess.create(config);

    const preHooks = Hooks.createRegistry<InputEnvelope>('pre', logger);
    const postHooks = Hooks.createRegistry<SuccessEnvelope>('post', logger, checkSuccessEnvelope);

    logger.info('Pipeline initialized with model: %s', config.model);

    const processInput = async (
        inputText: string,
        context?: unknown,
        templateName?: string,
    ): Promise<ResultEnvelope> => {
        const pipelineStart = Date.now();
        metrics.recordRequest();

        try {
            let envelope: InputEnvelope = { inputText, context };
            envelope = await preHooks.run(envelope);
            envelope = validation.validateInput(envelope);

            logger.info('Processing input: \'%s...\'', preview(envelope.inputText));

            const preprocessed = await timed(logger, 'preprocess', () =>
                preprocessor.run(envelope.inputText, envelope.context));
            const prompt = await timed(logger, 'composePrompt', () =>
                composer.compose(preprocessed, templateName));
            const inferenceResult = await timed(logger, 'runInference', () =>
                inference.run(prompt));
            let result = await timed(logger, 'postprocess', () =>
                postprocessor.run(inferenceResult, envelope.context));

            if (result.tokenUsage) {
                logger.info('Token usage: %d (prompt: %d, completion: %d)',
                    result.tokenUsage.totalTokens,
                    result.tokenUsage.promptTokens,
                    result.tokenUsage.completionTokens);
            }

            result = validation.validateOutput(result);
            result = await postHooks.run(result);

            metrics.recordSuccess();
            metrics.timePipeline(pipelineStart);

            logger.info('Processing completed successfully');
            return result;
        } catch (error) {
            metrics.recordFailure();

            if (isPipelineError(error)) {
                logger.error('Pipeline error: %s', error.message);
                const failure: FailureEnvelope = {
                    error: error.message,
                    input: inputText,
                    context,
                    status: 'failed',
                };
                return failure;
            }

            logger.error('Unexpected error: %s', describeError(error), {
                stack: error instanceof Error ? error.stack : undefined,
            });
            return { error: INTERNAL_ERROR_MESSAGE, status: 'failed' };
        }
    };

    return {
        config,
        metrics,
        process: processInput,
        addPreHook: (hook) => preHooks.add(hook),
        addPostHook: (hook) => postHooks.add(hook),
        removePreHook: (index) => preHooks.remove(index),
        removePostHook: (index) => postHooks.remove(index),
        preprocess: (inputText, context) => preprocessor.run(inputText, context),
        composePrompt: (data, templateName) => composer.compose(data, templateName),
        runInference: (prompt) => inference.run(prompt),
        postprocess: (result, context) => postprocessor.run(result, context),
    };
};
