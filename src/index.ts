export * from './errors.js';
export * from './config/index.js';
export * from './logging/index.js';
export * from './providers/index.js';
export * from './schema/index.js';
export * from './router/index.js';
export * from './readiness/index.js';
export * from './corpus/index.js';
export * from './quiz/index.js';
export * from './session/index.js';
export { createApp } from './app.js';
export type { RecallApp } from './app.js';
