/**
 * Command line interface
 *
 *   prompt-relay run <text> [--context <json|text>] [--template <name>]
 *   prompt-relay serve [--port <number>] [--host <address>] [--expose-metrics] [--metrics-port <number>]
 *
 * Flags override environment configuration (LLM_API_KEY, MODEL_NAME, ...).
 */

import { Command, InvalidArgumentError } from 'commander';
import * as Config from '@/config';
import { DEFAULT_HTTP_HOST, DEFAULT_HTTP_PORT, PROGRAM_NAME, VERSION } from '@/constants';
import * as Logging from '@/logging';
import * as Pipeline from '@/pipeline';
import * as Server from '@/server';

export interface CliIo {
    write(text: string): void;
    setExitCode(code: number): void;
}

export interface CliDependencies {
    env: Config.Env;
    io: CliIo;
    createPipeline?: (config: Config.PipelineConfigInput) => Pipeline.PipelineInstance;
    startServer?: typeof Server.start;
    startMetricsServer?: typeof Server.startMetrics;
}

interface PipelineFlags {
    model?: string;
    template?: string;
    templateDir?: string;
    uppercase?: boolean;
    lowercase?: boolean;
    strip?: boolean;
    retries?: number;
    logLevel?: string;
}

interface RunFlags extends PipelineFlags {
    context?: string;
}

interface ServeFlags extends PipelineFlags {
    port: number;
    host: string;
    exposeMetrics?: boolean;
    metricsPort?: number;
}

/** JSON when it parses, the raw string otherwise. */
export const parseContext = (raw: string | undefined): unknown => {
    if (raw === undefined) {
        return undefined;
    }
    try {
        return JSON.parse(raw);
    } catch {
        return raw;
    }
};

const parseInteger = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
};

const applyLogLevel = (level: string | undefined): void => {
    if (level === undefined) {
        return;
    }
    if (!Logging.isLogLevel(level)) {
        throw new InvalidArgumentError(`Unknown log level: ${level}`);
    }
    Logging.setLogLevel(level);
};

const toConfig = (env: Config.Env, flags: PipelineFlags): Config.PipelineConfigInput => ({
    ...Config.fromEnv(env),
    ...(flags.model !== undefined && { model: flags.model }),
    ...(flags.templateDir !== undefined && { templateDir: flags.templateDir }),
    ...(flags.uppercase !== undefined && { uppercaseOutput: flags.uppercase }),
    ...(flags.lowercase !== undefined && { lowercaseInput: flags.lowercase }),
    ...(flags.strip !== undefined && { stripInput: flags.strip }),
    ...(flags.retries !== undefined && { maxRetries: flags.retries }),
});

const addPipelineOptions = (command: Command): Command => command
    .option('-m, --model <name>', 'model identifier (env: MODEL_NAME)')
    .option('--template-dir <dir>', 'directory holding prompt templates (env: TEMPLATE_DIR)')
    .option('--uppercase', 'uppercase the final output')
    .option('--lowercase', 'lowercase the input')
    .option('--no-lowercase', 'keep the input\'s case')
    .option('--strip', 'trim surrounding whitespace from the input')
    .option('--no-strip', 'keep surrounding whitespace')
    .option('--retries <count>', 'maximum inference attempts (env: MAX_RETRIES)', parseInteger)
    .option('--log-level <level>', 'error, warn, info, verbose or debug');

export const createProgram = (deps: CliDependencies): Command => {
    const createPipeline = deps.createPipeline ?? ((config) => Pipeline.create(config));
    const startServer = deps.startServer ?? Server.start;
    const startMetricsServer = deps.startMetricsServer ?? Server.startMetrics;

    const program = new Command();
    program
        .name(PROGRAM_NAME)
        .description('Render text into a prompt, call a text generation API and post-process the answer')
        .version(VERSION);

    addPipelineOptions(
        program
            .command('run <text>')
            .description('Process one input and print the result envelope as JSON')
            .option('-c, --context <value>', 'context passed to the template (JSON or plain text)')
            .option('-t, --template <name>', 'template file name inside the template directory'),
    ).action(async (text: string, flags: RunFlags) => {
        const config = toConfig(deps.env, flags);
        applyLogLevel(flags.logLevel ?? config.logLevel);
        const pipeline = createPipeline(config);
        const result = await pipeline.process(text, parseContext(flags.context), flags.template);

        deps.io.write(`${JSON.stringify(result, null, 2)}\n`);
        if (Pipeline.isFailure(result)) {
            deps.io.setExitCode(1);
        }
    });

    addPipelineOptions(
        program
            .command('serve')
            .description('Serve the pipeline over HTTP')
            .option('-p, --port <number>', 'HTTP port to listen on', parseInteger, DEFAULT_HTTP_PORT)
            .option('--host <address>', 'host address to bind to', DEFAULT_HTTP_HOST)
            .option('--expose-metrics', 'serve GET /metrics on the metrics port (env: EXPOSE_METRICS)')
            .option('--metrics-port <number>', 'metrics port (env: METRICS_PORT)', parseInteger),
    ).action((flags: ServeFlags) => {
        const config: Config.PipelineConfigInput = {
            ...toConfig(deps.env, flags),
            ...(flags.exposeMetrics !== undefined && { exposeMetrics: flags.exposeMetrics }),
            ...(flags.metricsPort !== undefined && { metricsPort: flags.metricsPort }),
        };
        applyLogLevel(flags.logLevel ?? config.logLevel);
        const pipeline = createPipeline(config);
        const { exposeMetrics, collectMetrics, metricsPort } = pipeline.config;

        if (exposeMetrics && collectMetrics && metricsPort === flags.port) {
            throw new InvalidArgumentError(`Metrics port ${metricsPort} is already used by the HTTP server`);
        }

        startServer(pipeline, { port: flags.port, host: flags.host });
        if (exposeMetrics && collectMetrics) {
            startMetricsServer(pipeline, { port: metricsPort, host: flags.host });
        }
    });

    return program;
};
