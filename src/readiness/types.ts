import type { RecallError } from '../errors.js';

export type ProbeState =
  | 'UNCHECKED'
  | 'CHECKING_SERVICE'
  | 'SERVICE_UP'
  | 'STARTING_SERVICE'
  | 'CHECKING_MODEL'
  | 'MODEL_PRESENT'
  | 'PULLING_MODEL'
  | 'READY'
  | 'FAILED';

export interface ProbeReport {
  state: ProbeState;
  /** Last status line, or the failure message when state is FAILED */
  message: string;
  /** Every state entered during the run, in order */
  transitions: ProbeState[];
  error?: RecallError;
}

export type TransitionListener = (state: ProbeState, message: string) => void;

export interface CorpusCheck {
  readonly directory: string;
  hasDocuments(): Promise<boolean>;
}

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_MAX_START_ATTEMPTS = 10;
