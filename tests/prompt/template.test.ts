import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import * as Template from '../../src/prompt/template';
import { FALLBACK_TEMPLATE } from '../../src/constants';
import { PromptCompositionError } from '../../src/pipeline/errors';
import { createMockLogger, type MockLogger } from '../mocks';

describe('render', () => {
    it('substitutes named placeholders', () => {
        const rendered = Template.render(
            'User: {user_input}\nContext: {context}\nResponse:',
            { user_input: 'hello', context: 'greeting' },
        );
        expect(rendered).toBe('User: hello\nContext: greeting\nResponse:');
    });

    it('renders doubled braces as literal braces', () => {
        expect(Template.render('{{"q": "{user_input}"}}', { user_input: 'hi' })).toBe('{"q": "hi"}');
    });

    it('does not re-expand placeholders inside substituted values', () => {
        expect(Template.render('{user_input}', { user_input: '{context}', context: 'x' })).toBe('{context}');
    });

    it('rejects a placeholder without a value', () => {
        expect(() => Template.render('{missing}', {}, 'custom.txt')).toThrow(PromptCompositionError);
        expect(() => Template.render('{missing}', {}, 'custom.txt'))
            .toThrow('Template "custom.txt" references unknown placeholder: missing');
    });

    it('does not treat inherited object keys as values', () => {
        expect(() => Template.render('{constructor}', {})).toThrow(PromptCompositionError);
    });
});

describe('formatValue', () => {
    it('formats each kind of context value', () => {
        expect(Template.formatValue('text')).toBe('text');
        expect(Template.formatValue(undefined)).toBe('');
        expect(Template.formatValue(null)).toBe('');
        expect(Template.formatValue(3)).toBe('3');
        expect(Template.formatValue(false)).toBe('false');
        expect(Template.formatValue({ audience: 'beginners' })).toBe('{"audience":"beginners"}');
        expect(Template.formatValue(['a', 1])).toBe('["a",1]');
    });
});

describe('createLoader', () => {
    let templateDir: string;
    let logger: MockLogger;

    beforeEach(async () => {
        templateDir = await fs.mkdtemp(path.join(os.tmpdir(), 'prompt-relay-templates-'));
        logger = createMockLogger();
    });

    afterEach(async () => {
        await fs.rm(templateDir, { recursive: true, force: true });
    });

    it('reads a template from the template directory', async () => {
        await fs.writeFile(path.join(templateDir, 'greet.txt'), 'Say hi to {user_input}');
        const loader = Template.createLoader({ templateDir, logger });

        const template = await loader.load('greet.txt');

        expect(template).toEqual({ name: 'greet.txt', source: 'Say hi to {user_input}', fallback: false });
    });

    it('re-reads the file on every load', async () => {
        const file = path.join(templateDir, 'live.txt');
        await fs.writeFile(file, 'first');
        const loader = Template.createLoader({ templateDir, logger });
        expect((await loader.load('live.txt')).source).toBe('first');

        await fs.writeFile(file, 'second');
        expect((await loader.load('live.txt')).source).toBe('second');
    });

    it('falls back and warns when the file does not exist', async () => {
        const loader = Template.createLoader({ templateDir, logger });

        const template = await loader.load('missing.txt');

        expect(template).toEqual({ name: 'missing.txt', source: FALLBACK_TEMPLATE, fallback: true });
        expect(logger.warn).toHaveBeenCalledWith(
            'Template file not found: %s, using fallback template',
            path.join(templateDir, 'missing.txt'),
        );
    });

    it('falls back when the template directory does not exist', async () => {
        const loader = Template.createLoader({ templateDir: path.join(templateDir, 'nope'), logger });
        expect((await loader.load('default.txt')).fallback).toBe(true);
    });

    it('refuses names that escape the template directory', async () => {
        await fs.writeFile(path.join(os.tmpdir(), 'outside.txt'), 'secret');
        const loader = Template.createLoader({ templateDir, logger });

        const template = await loader.load('../outside.txt');

        expect(template.source).toBe(FALLBACK_TEMPLATE);
        expect(logger.warn).toHaveBeenCalledWith(
            'Template name escapes template directory: %s, using fallback template',
            '../outside.txt',
        );
        await fs.rm(path.join(os.tmpdir(), 'outside.txt'), { force: true });
    });
});
