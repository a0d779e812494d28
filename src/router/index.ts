export { ChatRouter } from './chat-router.js';
export type { ChatRouterOptions, SwitchOutcome, LocalReadinessCheck } from './chat-router.js';
