/**
 * Logging utility, re-exported from @devbar/core
 *
 * Usage:
 *   import { getLog } from '../services/log.js';
 *   const log = getLog('DebugToolbar');
 *   log.info('Toolbar mounted', { apiPath: '/_debug_toolbar' });
 */

export { getLog } from '@devbar/core';
