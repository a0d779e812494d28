export { ReadinessProber, isModelInstalled } from './prober.js';
export type { ReadinessProberOptions } from './prober.js';
export { DetachedProcessLauncher, isExecutableMissing } from './service-launcher.js';
export type { ServiceLauncher } from './service-launcher.js';
export { DEFAULT_POLL_INTERVAL_MS, DEFAULT_MAX_START_ATTEMPTS } from './types.js';
export type { ProbeState, ProbeReport, TransitionListener, CorpusCheck, Sleep } from './types.js';
