import { describe, it, expect } from 'vitest';
import * as Preprocess from '../../src/pipeline/preprocess';
import { InputShapeError } from '../../src/pipeline/errors';
import { createMockLogger } from '../mocks';

const build = (stripInput: boolean, lowercaseInput: boolean) =>
    Preprocess.create({ stripInput, lowercaseInput }, createMockLogger());

describe('Preprocess', () => {
    it('strips and lowercases with the default flags', () => {
        const result = build(true, true).run('  TEST Input  ', 'test context');
        expect(result).toEqual({ input: 'test input', context: 'test context' });
    });

    it.each([
        [true, true, 'hello world'],
        [true, false, 'Hello World'],
        [false, true, '  hello world \n'],
        [false, false, '  Hello World \n'],
    ])('strip=%s lowercase=%s', (strip, lowercase, expected) => {
        expect(build(strip, lowercase).run('  Hello World \n', null).input).toBe(expected);
    });

    it('passes the context through by reference', () => {
        const context = { audience: 'beginners' };
        expect(build(true, true).run('x', context).context).toBe(context);
    });

    it('rejects non-string input', () => {
        const preprocess = build(true, true);
        expect(() => preprocess.run(42, null)).toThrow(InputShapeError);
        expect(() => preprocess.run(null, null)).toThrow('Input must be a string, got null');
        expect(() => preprocess.run(['a'], null)).toThrow('Input must be a string, got array');
    });

    it('keeps an empty string empty', () => {
        expect(build(true, true).run('   ', undefined).input).toBe('');
    });
});

describe('describeType', () => {
    it('names values the way error messages report them', () => {
        expect(Preprocess.describeType(undefined)).toBe('undefined');
        expect(Preprocess.describeType({})).toBe('object');
        expect(Preprocess.describeType(1)).toBe('number');
    });
});
