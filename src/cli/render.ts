import { PROVIDER_LABELS } from '../providers/types.js';
import type { SessionPhase, SessionState } from '../session/quiz-session.js';
import type { EvaluationVerdict } from '../schema/verdict.js';
import { icons, indentBlock, keyValue, Spinner, style, subheader } from './theme.js';

const BUSY_TEXT: Partial<Record<SessionPhase, string>> = {
  generating: 'Selecting article and generating question...',
  evaluating: 'Evaluating answer...',
  switching: 'Switching provider...',
};

export function formatVerdict(verdict: EvaluationVerdict): string {
  const badge = verdict.result === 'PASS'
    ? `${style.success(icons.passed)} ${style.bold(style.success('PASS'))}`
    : `${style.error(icons.failed)} ${style.bold(style.error('FAIL'))}`;

  return [
    '',
    badge,
    '',
    indentBlock(verdict.explanation),
    subheader('Expected Answer'),
    indentBlock(verdict.referenceAnswer),
    '',
  ].join('\n');
}

export function formatQuestion(state: SessionState): string {
  const lines = [subheader(`${icons.question} Question`), indentBlock(state.question ?? '')];
  if (state.document) {
    lines.push('', `  ${style.muted(`Source: ${state.document.title}`)}`);
  }
  lines.push(`  ${style.muted(`Provider: ${PROVIDER_LABELS[state.provider]}`)}`, '');
  return lines.join('\n');
}

/**
 * Turns session states into terminal output. Called once per state change;
 * busy phases get a spinner, settled phases print their content.
 */
export class TerminalRenderer {
  private spinner?: Spinner;
  private write: (text: string) => void;

  constructor(write: (text: string) => void = (text) => console.log(text)) {
    this.write = write;
  }

  render(state: SessionState): void {
    const busyText = BUSY_TEXT[state.phase];
    if (busyText) {
      this.spinner?.stop();
      this.spinner = new Spinner(busyText);
      this.spinner.start();
      return;
    }

    this.spinner?.stop();
    this.spinner = undefined;

    if (state.notice) {
      this.write(`${style.info(icons.info)} ${state.notice}`);
    }

    switch (state.phase) {
      case 'answering':
        this.write(formatQuestion(state));
        break;
      case 'reviewing':
        if (state.verdict) {
          this.write(formatVerdict(state.verdict));
        } else if (state.error) {
          this.write(`\n${style.error(state.error.message)}\n`);
        }
        break;
      case 'idle':
        if (state.error) {
          this.write(`\n${style.error(state.error.message)}\n`);
          this.write(keyValue('Tip', 'Choose "Next question" to try another note'));
        }
        break;
    }
  }

  dispose(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }
}
