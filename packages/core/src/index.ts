/**
 * @devbar/core
 *
 * Framework-neutral debug toolbar: response interception, decompression,
 * fragment injection, panels and request history.
 * Uses only Node.js built-in modules, plus fzstd when it is installed.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Services (logging)
export * from './services/index.js';

// Configuration
export * from './config/index.js';

// Content-Encoding stack, codecs, decompression cascade
export * from './encoding/index.js';

// Response interception pipeline
export * from './response/index.js';

// Request context, panels, history, orchestrator
export * from './toolbar/index.js';

// Version
export const VERSION = '0.1.0';
