/**
 * Inference
 *
 * Stage 3 client plus the offline mock it falls back to.
 */

export { create, createClient, toBaseUrl, backoffDelayMs, isRetryableStatus, buildRequest } from './client';
export { respond as mockRespond, countWords } from './mock';
export type { ChatClient, Sleep, InferenceConfig, InferenceOptions, InferenceInstance } from './types';
