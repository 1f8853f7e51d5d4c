export * from './encoding-stack.js';
export * from './codec-registry.js';
export * from './cascade.js';
