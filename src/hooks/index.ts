/**
 * Hook Registry
 *
 * Ordered extension points around the pipeline. Pre-hooks receive the
 * input envelope before validation; post-hooks receive the result
 * envelope after output validation. Registration order is run order.
 */

import type { Logger } from '@/logging';
import { HookError, describeError, isPipelineError } from '@/pipeline/errors';

export type HookPhase = 'pre' | 'post';

export type HookFn<T> = (envelope: T) => T | Promise<T>;

export interface Hook<T> {
    readonly name: string;
    transform(envelope: T): T | Promise<T>;
}

export type HookLike<T> = Hook<T> | HookFn<T>;

export interface RegistryInstance<T> {
    readonly phase: HookPhase;
    readonly size: number;
    add(hook: HookLike<T>): Hook<T>;
    remove(index: number): Hook<T> | undefined;
    list(): ReadonlyArray<Hook<T>>;
    run(envelope: T): Promise<T>;
}

const isEnvelope = (value: unknown): boolean =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Describes what is wrong with an envelope returned by a hook, or null
 * when it is acceptable.
 */
export type EnvelopeCheck<T> = (envelope: T) => string | null;

export const createRegistry = <T extends object>(
    phase: HookPhase,
    logger: Logger,
    check?: EnvelopeCheck<T>,
): RegistryInstance<T> => {
    const hooks: Array<Hook<T>> = [];
    let anonymousCount = 0;

    const toHook = (hook: HookLike<T>): Hook<T> => {
        if (typeof hook !== 'function') {
            return hook;
        }
        const name = hook.name || `anonymous-${phase}-hook-${++anonymousCount}`;
        return { name, transform: hook };
    };

    const add = (hook: HookLike<T>): Hook<T> => {
        const registered = toHook(hook);
        hooks.push(registered);
        logger.info('Added %s-processing hook: %s', phase, registered.name);
        return registered;
    };

    const remove = (index: number): Hook<T> | undefined => {
        if (!Number.isInteger(index) || index < 0 || index >= hooks.length) {
            return undefined;
        }
        const [removed] = hooks.splice(index, 1);
        logger.info('Removed %s-processing hook: %s', phase, removed.name);
        return removed;
    };

    const run = async (envelope: T): Promise<T> => {
        let current = envelope;
        // Snapshot so registrations made during a run apply to the next call
        for (const hook of [...hooks]) {
            let next: T;
            try {
                next = await hook.transform(current);
            } catch (error) {
                if (isPipelineError(error)) {
                    throw error;
                }
                throw new HookError(phase, hook.name, describeError(error), error);
            }
            if (!isEnvelope(next)) {
                throw new HookError(phase, hook.name, 'hook did not return an envelope');
            }
            const problem = check?.(next) ?? null;
            if (problem !== null) {
                throw new HookError(phase, hook.name, problem);
            }
            current = next;
        }
        return current;
    };

    return {
        phase,
        get size() {
            return hooks.length;
        },
        add,
        remove,
        list: () => [...hooks],
        run,
    };
};
