export * from './conversation/index.js';
export * from './router/index.js';
export * from './session/index.js';
