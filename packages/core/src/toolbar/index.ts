export * from './context.js';
export * from './panel.js';
export * from './panels/index.js';
export * from './storage.js';
export * from './renderer.js';
export * from './toolbar.js';
