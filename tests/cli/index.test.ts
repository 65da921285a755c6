import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { Command } from 'commander';
import { createProgram, parseContext, type CliIo } from '../../src/cli';
import type { PipelineConfigInput } from '../../src/config';
import * as Pipeline from '../../src/pipeline';
import type { LoaderInstance } from '../../src/prompt';
import { createMockLogger } from '../mocks';

const templates: LoaderInstance = {
    load: async (name) => ({ name, source: '{user_input}', fallback: false }),
};

const quiet = (program: Command): Command => {
    program.exitOverride();
    program.configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    for (const command of program.commands) {
        command.exitOverride();
        command.configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    }
    return program;
};

describe('parseContext', () => {
    it('parses JSON and falls back to the raw text', () => {
        expect(parseContext('{"a":1}')).toEqual({ a: 1 });
        expect(parseContext('42')).toBe(42);
        expect(parseContext('plain words')).toBe('plain words');
        expect(parseContext(undefined)).toBeUndefined();
    });
});

describe('createProgram', () => {
    let io: { write: Mock<CliIo['write']>; setExitCode: Mock<CliIo['setExitCode']> };
    let configs: PipelineConfigInput[];

    const createPipeline = (config: PipelineConfigInput) => {
        configs.push(config);
        return Pipeline.create(config, {
            logger: createMockLogger(),
            templates,
            inference: { run: async (prompt) => ({ content: `echo ${prompt}`, usage: null }) },
        });
    };

    const written = (): unknown => {
        const text = String(io.write.mock.calls[0]?.[0]);
        expect(text.endsWith('\n')).toBe(true);
        return JSON.parse(text);
    };

    beforeEach(() => {
        io = { write: vi.fn(), setExitCode: vi.fn() };
        configs = [];
    });

    it('runs one input and prints the envelope', async () => {
        const program = quiet(createProgram({ env: {}, io, createPipeline }));

        await program.parseAsync(['run', '  Hello There '], { from: 'user' });

        expect(written()).toMatchObject({ finalOutput: 'echo hello there', tokenUsage: null });
        expect(io.setExitCode).not.toHaveBeenCalled();
    });

    it('passes context and template through', async () => {
        const load = vi.fn(async (name: string) => ({ name, source: '{user_input}/{context}', fallback: false }));
        const program = quiet(createProgram({
            env: {},
            io,
            createPipeline: (config) => Pipeline.create(config, {
                logger: createMockLogger(),
                templates: { load },
                inference: { run: async (prompt) => ({ content: prompt, usage: null }) },
            }),
        }));

        await program.parseAsync(['run', 'q', '--context', '{"n":2}', '--template', 'qa.txt'], { from: 'user' });

        expect(load).toHaveBeenCalledWith('qa.txt');
        expect(written()).toMatchObject({ finalOutput: 'q/{"n":2}', contextUsed: { n: 2 } });
    });

    it('lets flags override the environment', async () => {
        const program = quiet(createProgram({
            env: { MODEL_NAME: 'env-model', MAX_RETRIES: '5', LOWERCASE_INPUT: 'true' },
            io,
            createPipeline,
        }));

        await program.parseAsync(
            ['run', 'Keep Case', '--model', 'flag-model', '--no-lowercase', '--uppercase', '--retries', '2'],
            { from: 'user' },
        );

        expect(configs[0]).toMatchObject({
            model: 'flag-model',
            maxRetries: 2,
            lowercaseInput: false,
            uppercaseOutput: true,
        });
        expect(written()).toMatchObject({ finalOutput: 'ECHO KEEP CASE' });
    });

    it('leaves environment values alone when no flag is given', async () => {
        const program = quiet(createProgram({ env: { MODEL_NAME: 'env-model' }, io, createPipeline }));

        await program.parseAsync(['run', 'x'], { from: 'user' });

        expect(configs[0]?.model).toBe('env-model');
        expect(configs[0]?.lowercaseInput).toBeUndefined();
    });

    it('sets a failing exit code when processing fails', async () => {
        const program = quiet(createProgram({ env: {}, io, createPipeline }));

        await program.parseAsync(['run', '   '], { from: 'user' });

        expect(written()).toMatchObject({ status: 'failed', input: '   ' });
        expect(io.setExitCode).toHaveBeenCalledWith(1);
    });

    it('rejects an unknown log level', async () => {
        const program = quiet(createProgram({ env: {}, io, createPipeline }));

        await expect(program.parseAsync(['run', 'x', '--log-level', 'loud'], { from: 'user' }))
            .rejects.toThrow('Unknown log level: loud');
        expect(io.write).not.toHaveBeenCalled();
    });

    it('rejects a non-integer retry count', async () => {
        const program = quiet(createProgram({ env: {}, io, createPipeline }));

        await expect(program.parseAsync(['run', 'x', '--retries', 'lots'], { from: 'user' }))
            .rejects.toThrow('Not an integer.');
    });

    it('starts the server with the requested address', async () => {
        const startServer = vi.fn();
        const program = quiet(createProgram({ env: {}, io, createPipeline, startServer }));

        await program.parseAsync(['serve', '--port', '9000'], { from: 'user' });

        expect(startServer).toHaveBeenCalledTimes(1);
        expect(startServer).toHaveBeenCalledWith(expect.objectContaining({ config: expect.any(Object) }), {
            port: 9000,
            host: '127.0.0.1',
        });
    });

    it('starts no metrics listener unless metrics are exposed', async () => {
        const startServer = vi.fn();
        const startMetricsServer = vi.fn();
        const program = quiet(createProgram({ env: {}, io, createPipeline, startServer, startMetricsServer }));

        await program.parseAsync(['serve'], { from: 'user' });

        expect(startServer).toHaveBeenCalledWith(expect.any(Object), { port: 8000, host: '127.0.0.1' });
        expect(startMetricsServer).not.toHaveBeenCalled();
    });

    it('starts the metrics listener on the configured port', async () => {
        const startServer = vi.fn();
        const startMetricsServer = vi.fn();
        const program = quiet(createProgram({
            env: { EXPOSE_METRICS: 'true', METRICS_PORT: '9100' },
            io,
            createPipeline,
            startServer,
            startMetricsServer,
        }));

        await program.parseAsync(['serve', '--host', '0.0.0.0'], { from: 'user' });

        expect(startMetricsServer).toHaveBeenCalledTimes(1);
        expect(startMetricsServer).toHaveBeenCalledWith(
            expect.objectContaining({ metrics: expect.objectContaining({ enabled: true }) }),
            { port: 9100, host: '0.0.0.0' },
        );
    });

    it('takes the metrics flags over the environment', async () => {
        const startMetricsServer = vi.fn();
        const program = quiet(createProgram({
            env: { METRICS_PORT: '9100' },
            io,
            createPipeline,
            startServer: vi.fn(),
            startMetricsServer,
        }));

        await program.parseAsync(['serve', '--expose-metrics', '--metrics-port', '9200'], { from: 'user' });

        expect(startMetricsServer).toHaveBeenCalledWith(expect.any(Object), { port: 9200, host: '127.0.0.1' });
    });

    it('skips the metrics listener when collection is off', async () => {
        const startMetricsServer = vi.fn();
        const program = quiet(createProgram({
            env: { EXPOSE_METRICS: 'true', COLLECT_METRICS: 'false' },
            io,
            createPipeline,
            startServer: vi.fn(),
            startMetricsServer,
        }));

        await program.parseAsync(['serve'], { from: 'user' });

        expect(startMetricsServer).not.toHaveBeenCalled();
    });

    it('refuses a metrics port equal to the HTTP port', async () => {
        const startServer = vi.fn();
        const program = quiet(createProgram({
            env: { EXPOSE_METRICS: 'true', METRICS_PORT: '8000' },
            io,
            createPipeline,
            startServer,
            startMetricsServer: vi.fn(),
        }));

        await expect(program.parseAsync(['serve'], { from: 'user' }))
            .rejects.toThrow('Metrics port 8000 is already used by the HTTP server');
        expect(startServer).not.toHaveBeenCalled();
    });
});
