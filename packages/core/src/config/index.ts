export * from './defaults.js';
export * from './toolbar-config.js';
