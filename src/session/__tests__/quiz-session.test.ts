import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { SourceDocument } from '../../corpus/document-store.js';
import { CorpusEmptyError } from '../../errors.js';
import type { ProviderIdentity } from '../../providers/types.js';
import type { EvaluationOutcome, QuestionOutcome } from '../../quiz/orchestrator.js';
import type { SwitchOutcome } from '../../router/chat-router.js';
import { QuizSession, type SessionPhase, type SessionState } from '../quiz-session.js';

const DOC: SourceDocument = {
  title: 'closures.md',
  path: '/notes/closures.md',
  text: 'A closure keeps the variables of its enclosing scope alive.',
};

const VERDICT = { result: 'PASS', explanation: 'Correct.', referenceAnswer: 'It captures the scope.' } as const;

/** Let pending background promises settle without pumping the session. */
const flush = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe('QuizSession', () => {
  const pickRandom = vi.fn<() => Promise<SourceDocument>>();
  const generateQuestion = vi.fn<(documentText: string) => Promise<QuestionOutcome>>();
  const evaluateAnswer = vi.fn<(documentText: string, questionText: string, userAnswer: string) => Promise<EvaluationOutcome>>();
  const prepareSwitch = vi.fn<(identity: ProviderIdentity) => Promise<SwitchOutcome>>();
  let identity: ProviderIdentity;
  let phases: SessionPhase[];
  let session: QuizSession;

  beforeEach(() => {
    vi.resetAllMocks();
    identity = 'LOCAL';
    phases = [];
    pickRandom.mockResolvedValue(DOC);
    generateQuestion.mockResolvedValue({ ok: true, question: 'What does a closure keep alive?' });
    evaluateAnswer.mockResolvedValue({ ok: true, verdict: VERDICT });
    prepareSwitch.mockImplementation(async target => ({ ok: true, identity: target }));

    session = new QuizSession({
      documents: { pickRandom },
      orchestrator: { generateQuestion, evaluateAnswer },
      router: {
        get identity() {
          return identity;
        },
        other: () => (identity === 'LOCAL' ? 'CLOUD' : 'LOCAL'),
        prepareSwitch,
        applySwitch: (outcome: SwitchOutcome) => {
          if (outcome.ok) identity = outcome.identity;
        },
      },
      render: (state: SessionState) => phases.push(state.phase),
    });
  });

  async function reachAnswering() {
    session.requestQuestion();
    await session.settle();
  }

  describe('question generation', () => {
    it('should show the generated question', async () => {
      expect(session.requestQuestion()).toBe(true);
      expect(session.snapshot.phase).toBe('generating');

      const state = await session.settle();

      expect(state).toEqual({
        phase: 'answering',
        provider: 'LOCAL',
        document: DOC,
        question: 'What does a closure keep alive?',
      });
      expect(generateQuestion).toHaveBeenCalledWith(DOC.text);
      expect(phases).toEqual(['generating', 'answering']);
    });

    it('should refuse a second request while one is in flight', () => {
      session.requestQuestion();

      expect(session.requestQuestion()).toBe(false);
      expect(session.switchProvider()).toBe(false);
      expect(pickRandom).toHaveBeenCalledTimes(1);
    });

    it('should only change state when pumped', async () => {
      session.requestQuestion();
      await flush();

      expect(session.snapshot.phase).toBe('generating');

      await session.pump();
      expect(session.snapshot.phase).toBe('answering');
    });

    it('should show a failed generation as an error', async () => {
      generateQuestion.mockResolvedValue({
        ok: false,
        error: { code: 'MALFORMED_RESPONSE', message: 'Error: Malformed question: missing or invalid question' },
      });

      session.requestQuestion();
      const state = await session.settle();

      expect(state.phase).toBe('idle');
      expect(state.question).toBeUndefined();
      expect(state.error?.message).toBe('Error: Malformed question: missing or invalid question');
    });

    it('should show an empty corpus as an error', async () => {
      pickRandom.mockRejectedValue(new CorpusEmptyError('/notes'));

      session.requestQuestion();
      const state = await session.settle();

      expect(state).toEqual({
        phase: 'idle',
        provider: 'LOCAL',
        error: { code: 'CORPUS_EMPTY', message: 'Error: No .md files found in /notes' },
      });
    });
  });

  describe('answer evaluation', () => {
    it('should refuse an answer before a question exists', () => {
      expect(session.submitAnswer('anything')).toBe(false);
    });

    it('should refuse a blank answer', async () => {
      await reachAnswering();

      expect(session.submitAnswer('   ')).toBe(false);
      expect(session.snapshot.phase).toBe('answering');
    });

    it('should show the verdict for the answer', async () => {
      await reachAnswering();

      expect(session.submitAnswer('The enclosing scope.')).toBe(true);
      expect(session.snapshot.phase).toBe('evaluating');
      const state = await session.settle();

      expect(evaluateAnswer).toHaveBeenCalledWith(DOC.text, 'What does a closure keep alive?', 'The enclosing scope.');
      expect(state.phase).toBe('reviewing');
      expect(state.verdict).toEqual(VERDICT);
      expect(state.error).toBeUndefined();
    });

    it('should keep the question up when evaluation fails', async () => {
      evaluateAnswer.mockResolvedValue({
        ok: false,
        error: { code: 'BACKEND_ERROR', message: 'Error: OpenAI chat failed: 500' },
      });
      await reachAnswering();

      session.submitAnswer('The enclosing scope.');
      const state = await session.settle();

      expect(state.phase).toBe('reviewing');
      expect(state.question).toBe('What does a closure keep alive?');
      expect(state.verdict).toBeUndefined();
      expect(state.error?.message).toBe('Error: OpenAI chat failed: 500');
    });

    it('should start a fresh cycle after review', async () => {
      await reachAnswering();
      session.submitAnswer('The enclosing scope.');
      await session.settle();

      expect(session.requestQuestion()).toBe(true);
      const state = await session.settle();

      expect(state.verdict).toBeUndefined();
      expect(state.phase).toBe('answering');
    });
  });

  describe('provider switching', () => {
    it('should switch and return to the previous phase', async () => {
      await reachAnswering();

      expect(session.switchProvider()).toBe(true);
      expect(session.snapshot.phase).toBe('switching');
      const state = await session.settle();

      expect(prepareSwitch).toHaveBeenCalledWith('CLOUD');
      expect(state.phase).toBe('answering');
      expect(state.provider).toBe('CLOUD');
      expect(state.notice).toBe('Switched to OpenAI');
      expect(state.question).toBe('What does a closure keep alive?');
    });

    it('should report a refused switch and stay put', async () => {
      prepareSwitch.mockResolvedValue({
        ok: false,
        identity: 'LOCAL',
        reason: 'OPENAI_API_KEY must be set to use OpenAI',
      });

      session.switchProvider();
      const state = await session.settle();

      expect(state.phase).toBe('idle');
      expect(state.provider).toBe('LOCAL');
      expect(state.notice).toBe('Could not switch provider: OPENAI_API_KEY must be set to use OpenAI');
    });

    it('should report a switch that throws', async () => {
      prepareSwitch.mockRejectedValue(new Error('recheck crashed'));

      session.switchProvider();
      const state = await session.settle();

      expect(state.provider).toBe('LOCAL');
      expect(state.notice).toBe('Could not switch provider: Error: recheck crashed');
    });

    it('should use the new provider for the next question', async () => {
      session.switchProvider();
      await session.settle();

      session.requestQuestion();
      const state = await session.settle();

      expect(state.provider).toBe('CLOUD');
    });
  });
});
