/**
 * Pipeline
 *
 * Main entry point: `create(config?, options?)` builds a pipeline whose
 * `process()` turns free text into a result envelope.
 */

export { create, checkSuccessEnvelope, type PipelineInstance, type PipelineOptions } from './orchestrator';
export * from './errors';
export * from './types';
