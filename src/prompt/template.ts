/**
 * Prompt Templates
 *
 * Templates are plain text files with `{name}` placeholders. `{{` and `}}`
 * render a literal brace. Files are read on every load; a template that
 * cannot be read is replaced by FALLBACK_TEMPLATE.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DEFAULT_CHARACTER_ENCODING, FALLBACK_TEMPLATE } from '@/constants';
import type { Logger } from '@/logging';
import { PromptCompositionError, describeError } from '@/pipeline/errors';

export interface LoadedTemplate {
    name: string;
    source: string;
    /** True when FALLBACK_TEMPLATE was substituted */
    fallback: boolean;
}

export interface LoaderInstance {
    load(name: string): Promise<LoadedTemplate>;
}

export interface LoaderConfig {
    templateDir: string;
    logger: Logger;
}

const TOKEN_RE = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Render a value into prompt text. Strings are used verbatim, a missing
 * context renders as an empty string, structured values as JSON.
 */
export const formatValue = (value: unknown): string => {
    if (typeof value === 'string') return value;
    if (value === null || value === undefined) return '';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
};

export const render = (
    source: string,
    values: Record<string, unknown>,
    templateName = '(anonymous)',
): string => {
    return source.replace(TOKEN_RE, (token: string, name: string | undefined) => {
        if (token === '{{') return '{';
        if (token === '}}') return '}';
        if (name === undefined || !Object.prototype.hasOwnProperty.call(values, name)) {
            throw new PromptCompositionError(
                `Template "${templateName}" references unknown placeholder: ${name ?? token}`,
            );
        }
        return formatValue(values[name]);
    });
};

const isInside = (baseDir: string, filePath: string): boolean => {
    const relative = path.relative(baseDir, filePath);
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
};

const isNotFound = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');

export const createLoader = (config: LoaderConfig): LoaderInstance => {
    const { logger } = config;
    const baseDir = path.resolve(config.templateDir);

    const fallback = (name: string): LoadedTemplate => ({ name, source: FALLBACK_TEMPLATE, fallback: true });

    const load = async (name: string): Promise<LoadedTemplate> => {
        const templatePath = path.resolve(baseDir, name);

        if (!isInside(baseDir, templatePath)) {
            logger.warn('Template name escapes template directory: %s, using fallback template', name);
            return fallback(name);
        }

        try {
            const source = await fs.readFile(templatePath, DEFAULT_CHARACTER_ENCODING);
            logger.debug('Loaded template %s (%d chars)', templatePath, source.length);
            return { name, source, fallback: false };
        } catch (error) {
            if (isNotFound(error)) {
                logger.warn('Template file not found: %s, using fallback template', templatePath);
            } else {
                logger.warn('Could not read template %s (%s), using fallback template', templatePath, describeError(error));
            }
            return fallback(name);
        }
    };

    return { load };
};
