import { describe, it, expect, afterEach, vi } from 'vitest';
import * as Postprocess from '../../src/pipeline/postprocess';
import { OutputShapeError } from '../../src/pipeline/errors';

describe('Postprocess', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('packages the content, context, timestamp and usage', () => {
        vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_500);
        const usage = { promptTokens: 3, completionTokens: 7, totalTokens: 10 };

        const result = Postprocess.create({ uppercaseOutput: false })
            .run({ content: 'test output', usage }, 'test context');

        expect(result).toEqual({
            finalOutput: 'test output',
            contextUsed: 'test context',
            timestamp: 1_700_000_000.5,
            tokenUsage: usage,
        });
    });

    it('uppercases when configured', () => {
        const result = Postprocess.create({ uppercaseOutput: true })
            .run({ content: 'test output', usage: null }, null);
        expect(result.finalOutput).toBe('TEST OUTPUT');
    });

    it('leaves content unchanged when uppercase is off', () => {
        const result = Postprocess.create({ uppercaseOutput: false })
            .run({ content: 'Mixed Case', usage: null }, null);
        expect(result.finalOutput).toBe('Mixed Case');
    });

    it('reports missing usage as null', () => {
        const result = Postprocess.create({ uppercaseOutput: false })
            .run({ content: 'x', usage: null }, null);
        expect(result.tokenUsage).toBeNull();
    });

    it('rejects non-text content', () => {
        const postprocess = Postprocess.create({ uppercaseOutput: false });
        expect(() => postprocess.run({ content: null, usage: null }, null)).toThrow(OutputShapeError);
        expect(() => postprocess.run({ content: null, usage: null }, null))
            .toThrow('Output must be a string, got null');
    });
});
