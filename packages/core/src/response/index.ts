/**
 * Response pipeline
 */

export * from './types.js';
export * from './headers.js';
export * from './injection.js';
export * from './response-state.js';
export * from './eligibility.js';
export * from './interceptor.js';
