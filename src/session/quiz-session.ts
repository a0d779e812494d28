import type { SourceDocument } from '../corpus/document-store.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { ProviderIdentity } from '../providers/types.js';
import { PROVIDER_LABELS } from '../providers/types.js';
import type { DisplayError, EvaluationOutcome, QuestionOutcome } from '../quiz/orchestrator.js';
import { toDisplayError } from '../quiz/orchestrator.js';
import type { ChatRouter, SwitchOutcome } from '../router/chat-router.js';
import type { EvaluationVerdict } from '../schema/verdict.js';
import { EventChannel } from './channel.js';

export type SessionPhase = 'idle' | 'generating' | 'answering' | 'evaluating' | 'reviewing' | 'switching';

export interface SessionState {
  readonly phase: SessionPhase;
  readonly provider: ProviderIdentity;
  readonly document?: SourceDocument;
  readonly question?: string;
  readonly verdict?: EvaluationVerdict;
  /** Rendered in place of the question or the feedback */
  readonly error?: DisplayError;
  /** One-off status line, e.g. the result of a provider switch */
  readonly notice?: string;
}

export type SessionEvent =
  | { type: 'question-ready'; document: SourceDocument; outcome: QuestionOutcome }
  | { type: 'question-failed'; error: DisplayError }
  | { type: 'evaluation-ready'; outcome: EvaluationOutcome }
  | { type: 'switch-ready'; outcome: SwitchOutcome };

export interface QuizSessionDeps {
  documents: { pickRandom(): Promise<SourceDocument> };
  orchestrator: {
    generateQuestion(documentText: string): Promise<QuestionOutcome>;
    evaluateAnswer(documentText: string, questionText: string, userAnswer: string): Promise<EvaluationOutcome>;
  };
  router: Pick<ChatRouter, 'identity' | 'prepareSwitch' | 'applySwitch' | 'other'>;
  render?: (state: SessionState) => void;
  logger?: Logger;
}

const BUSY_PHASES: ReadonlySet<SessionPhase> = new Set(['generating', 'evaluating', 'switching']);

/**
 * Owns quiz state. Background work never touches it: each task posts a
 * SessionEvent, and `pump` (called from the foreground loop) is the only
 * place state changes and the only caller of `render`.
 */
export class QuizSession {
  private state: SessionState;
  private channel = new EventChannel<SessionEvent>();
  private deps: QuizSessionDeps;
  private logger: Logger;
  /** Phase to return to once a provider switch settles */
  private resumePhase: SessionPhase = 'idle';

  constructor(deps: QuizSessionDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
    this.state = { phase: 'idle', provider: deps.router.identity };
  }

  get snapshot(): SessionState {
    return this.state;
  }

  get busy(): boolean {
    return BUSY_PHASES.has(this.state.phase);
  }

  /** Pick a new document and start generating a question for it. */
  requestQuestion(): boolean {
    if (this.busy) {
      return false;
    }
    this.update({ phase: 'generating', provider: this.deps.router.identity });
    this.runInBackground(async () => {
      const document = await this.deps.documents.pickRandom();
      this.logger.info(`Selected ${document.title}`);
      const outcome = await this.deps.orchestrator.generateQuestion(document.text);
      return { type: 'question-ready', document, outcome };
    }, error => ({ type: 'question-failed', error: toDisplayError(error) }));
    return true;
  }

  /** Send the answer for grading. Refused unless a question is waiting for one. */
  submitAnswer(answer: string): boolean {
    const { phase, document, question } = this.state;
    if (phase !== 'answering' || !document || question === undefined || !answer.trim()) {
      return false;
    }
    this.update({ ...this.state, phase: 'evaluating', error: undefined, notice: undefined });
    this.runInBackground(async () => {
      const outcome = await this.deps.orchestrator.evaluateAnswer(document.text, question, answer);
      return { type: 'evaluation-ready', outcome };
    }, error => ({ type: 'evaluation-ready', outcome: { ok: false, error: toDisplayError(error) } }));
    return true;
  }

  /** Toggle between the local and cloud provider. */
  switchProvider(): boolean {
    if (this.busy) {
      return false;
    }
    const resumePhase = this.state.phase;
    const target = this.deps.router.other();
    this.update({ ...this.state, phase: 'switching', notice: undefined });
    this.resumePhase = resumePhase;
    this.runInBackground(async () => {
      const outcome = await this.deps.router.prepareSwitch(target);
      return { type: 'switch-ready', outcome };
    }, error => ({
      type: 'switch-ready',
      outcome: { ok: false, identity: this.deps.router.identity, reason: toDisplayError(error).message },
    }));
    return true;
  }

  /** Wait for the next background result and apply it. */
  async pump(): Promise<SessionEvent> {
    const event = await this.channel.next();
    this.apply(event);
    return event;
  }

  /** Pump until no request is in flight. */
  async settle(): Promise<SessionState> {
    while (this.busy) {
      await this.pump();
    }
    return this.state;
  }

  private apply(event: SessionEvent): void {
    switch (event.type) {
      case 'question-ready':
        if (event.outcome.ok) {
          this.update({
            phase: 'answering',
            provider: this.state.provider,
            document: event.document,
            question: event.outcome.question,
          });
        } else {
          this.update({
            phase: 'idle',
            provider: this.state.provider,
            document: event.document,
            error: event.outcome.error,
          });
        }
        break;

      case 'question-failed':
        this.update({ phase: 'idle', provider: this.state.provider, error: event.error });
        break;

      case 'evaluation-ready':
        if (event.outcome.ok) {
          this.update({ ...this.state, phase: 'reviewing', verdict: event.outcome.verdict, error: undefined });
        } else {
          // The question stays up so the user can see what failed; a new
          // question starts a new cycle.
          this.update({ ...this.state, phase: 'reviewing', verdict: undefined, error: event.outcome.error });
        }
        break;

      case 'switch-ready': {
        this.deps.router.applySwitch(event.outcome);
        const notice = event.outcome.ok
          ? `Switched to ${PROVIDER_LABELS[event.outcome.identity]}`
          : `Could not switch provider: ${event.outcome.reason}`;
        this.update({
          ...this.state,
          phase: this.resumePhase,
          provider: this.deps.router.identity,
          notice,
        });
        break;
      }
    }
  }

  private update(next: SessionState): void {
    this.state = next;
    this.deps.render?.(this.state);
  }

  private runInBackground(
    task: () => Promise<SessionEvent>,
    onError: (error: unknown) => SessionEvent
  ): void {
    void task().then(
      event => this.channel.post(event),
      (error: unknown) => {
        this.logger.error(`Background task failed: ${errorMessage(error)}`);
        this.channel.post(onError(error));
      }
    );
  }
}
