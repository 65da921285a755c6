/**
 * Metrics
 *
 * `create()` collects in memory; `createNoop()` is used when metrics
 * collection is switched off in config.
 */

export { create, createNoop } from './collector';
export * from './types';
