import { RecallError, errorMessage, type RecallErrorCode } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { JSON_FORMAT } from '../providers/types.js';
import type { ChatRouter } from '../router/chat-router.js';
import { parseQuestion } from '../schema/question.js';
import { parseVerdict, verdictFormat, type EvaluationVerdict } from '../schema/verdict.js';
import { buildEvaluationConversation, buildQuestionConversation } from './prompt-builder.js';

export interface DisplayError {
  /** Text rendered in place of the question or feedback */
  message: string;
  code: RecallErrorCode | 'UNKNOWN';
}

export type QuestionOutcome = { ok: true; question: string } | { ok: false; error: DisplayError };

export type EvaluationOutcome = { ok: true; verdict: EvaluationVerdict } | { ok: false; error: DisplayError };

type Chat = Pick<ChatRouter, 'chat' | 'identity'>;

export interface QuizOrchestratorOptions {
  router: Chat;
  logger?: Logger;
}

/**
 * Builds the two prompts, sends them through the router and validates what
 * comes back. Failures end up as display strings; nothing is retried.
 */
export class QuizOrchestrator {
  private router: Chat;
  private logger: Logger;

  constructor(options: QuizOrchestratorOptions) {
    this.router = options.router;
    this.logger = options.logger ?? silentLogger;
  }

  async generateQuestion(documentText: string): Promise<QuestionOutcome> {
    try {
      const raw = await this.router.chat(buildQuestionConversation(documentText), JSON_FORMAT);
      const parsed = parseQuestion(raw);
      if (!parsed.ok) {
        this.logger.error(`Generation error: ${parsed.error.message} (raw: ${truncate(raw)})`);
        return { ok: false, error: toDisplayError(parsed.error) };
      }
      this.logger.info('Generated question');
      return { ok: true, question: parsed.value };
    } catch (error) {
      this.logger.error(`Generation error: ${errorMessage(error)}`);
      return { ok: false, error: toDisplayError(error) };
    }
  }

  async evaluateAnswer(documentText: string, questionText: string, userAnswer: string): Promise<EvaluationOutcome> {
    const format = verdictFormat(this.router.identity);
    try {
      const raw = await this.router.chat(
        buildEvaluationConversation(documentText, questionText, userAnswer),
        format
      );
      const parsed = parseVerdict(raw);
      if (!parsed.ok) {
        this.logger.error(`Evaluation error: ${parsed.error.message} (raw: ${truncate(raw)})`);
        return { ok: false, error: toDisplayError(parsed.error) };
      }
      this.logger.info(`Evaluated answer: ${parsed.value.result}`);
      return { ok: true, verdict: parsed.value };
    } catch (error) {
      this.logger.error(`Evaluation error: ${errorMessage(error)}`);
      return { ok: false, error: toDisplayError(error) };
    }
  }
}

export function toDisplayError(error: unknown): DisplayError {
  if (error instanceof RecallError) {
    const hint = error.hint ? ` (${error.hint})` : '';
    return { message: `Error: ${error.message}${hint}`, code: error.code };
  }
  return { message: `Error: ${errorMessage(error)}`, code: 'UNKNOWN' };
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
