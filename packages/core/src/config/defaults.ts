/**
 * Toolbar defaults
 */

export const DEFAULT_INSERT_BEFORE = '</body>';
export const DEFAULT_MAX_REQUEST_HISTORY = 50;
export const DEFAULT_API_PATH = '/_debug_toolbar';
export const DEFAULT_STATIC_PATH = '/_debug_toolbar/static';

/** 10 MiB; applies to the encoded body and to each decoded layer */
export const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024;

export const DEFAULT_SERVER_TIMING = true;
