import { Command } from 'commander';
import { createApp } from '../../app.js';
import { loadSettingsFromEnvironment, withOverrides } from '../../config/index.js';
import { RecallError, errorMessage } from '../../errors.js';
import { PROVIDER_LABELS } from '../../providers/types.js';
import { QuizSession } from '../../session/quiz-session.js';
import type { SessionState } from '../../session/quiz-session.js';
import { TerminalRenderer } from '../render.js';
import {
  BANNER_MINIMAL,
  formatError,
  header,
  keyValue,
  Spinner,
  style,
} from '../theme.js';

type QuizAction = 'answer' | 'next' | 'switch' | 'quit';

interface QuizOptions {
  provider?: string;
  model?: string;
  articles?: string;
}

async function chooseAction(state: SessionState): Promise<QuizAction> {
  const { default: inquirer } = await import('inquirer');
  const choices: { name: string; value: QuizAction }[] = [];

  if (state.phase === 'answering') {
    choices.push({ name: 'Answer', value: 'answer' });
  }
  choices.push(
    { name: 'Next question', value: 'next' },
    { name: `Switch to ${state.provider === 'LOCAL' ? PROVIDER_LABELS.CLOUD : PROVIDER_LABELS.LOCAL}`, value: 'switch' },
    { name: 'Quit', value: 'quit' }
  );

  const { action } = await inquirer.prompt<{ action: QuizAction }>([{
    type: 'list',
    name: 'action',
    message: style.info('What next?'),
    choices,
  }]);
  return action;
}

async function askAnswer(): Promise<string> {
  const { default: inquirer } = await import('inquirer');
  const { answer } = await inquirer.prompt<{ answer: string }>([{
    type: 'input',
    name: 'answer',
    message: style.bold('Your answer:'),
  }]);
  return answer;
}

/**
 * Foreground loop: one request in flight at a time, results applied only
 * through `session.settle()`.
 */
export async function runQuizLoop(session: QuizSession): Promise<void> {
  session.requestQuestion();

  for (;;) {
    const state = await session.settle();
    const action = await chooseAction(state);

    switch (action) {
      case 'answer': {
        const answer = await askAnswer();
        if (!session.submitAnswer(answer)) {
          console.log(style.warning('Please type an answer first.'));
        }
        break;
      }
      case 'next':
        session.requestQuestion();
        break;
      case 'switch':
        session.switchProvider();
        break;
      case 'quit':
        return;
    }
  }
}

export const quizCommand = new Command('quiz')
  .description('Ask a question about a random note and grade your answer')
  .option('-p, --provider <name>', 'Provider to start with (ollama or openai)')
  .option('-m, --model <name>', 'Local model name, overriding MODEL_NAME')
  .option('-a, --articles <dir>', 'Directory of markdown notes, overriding ARTICLES_DIR')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('recall quiz')}                        ${style.dim('Quiz with DEFAULT_PROVIDER from .env')}
  ${style.command('recall quiz -p openai')}              ${style.dim('Use OpenAI for questions and grading')}
  ${style.command('recall quiz -a ~/notes/python')}      ${style.dim('Quiz on a different folder')}
`)
  .action(async (options: QuizOptions) => {
    let renderer: TerminalRenderer | undefined;
    try {
      const settings = withOverrides(loadSettingsFromEnvironment(), options);
      const app = createApp(settings);
      app.logger.info(`Starting quiz with ${PROVIDER_LABELS[settings.defaultProvider]}`);

      console.log(`\n${BANNER_MINIMAL}`);
      console.log(header('Recall'));
      console.log(keyValue('Provider', style.highlight(PROVIDER_LABELS[settings.defaultProvider])));
      console.log(keyValue('Model', style.highlight(app.router.modelName)));
      console.log(keyValue('Notes', style.path(settings.articlesDir)));
      console.log();

      const spinner = new Spinner('Checking dependencies...');
      spinner.start();
      const unsubscribe = app.prober.onTransition((_, message) => spinner.update(message));
      const report = await app.prober.probe(settings.defaultProvider);
      unsubscribe();

      if (report.state !== 'READY') {
        spinner.fail(report.message);
        console.error(formatError(report.message, report.error?.hint ? [report.error.hint] : undefined));
        process.exit(1);
      }
      spinner.succeed('Ready!');
      if (settings.defaultProvider === 'LOCAL') {
        app.router.markLocalVerified();
      }

      const activeRenderer = new TerminalRenderer();
      renderer = activeRenderer;
      const session = new QuizSession({
        documents: app.documents,
        orchestrator: app.orchestrator,
        router: app.router,
        render: (state) => activeRenderer.render(state),
        logger: app.logger,
      });

      await runQuizLoop(session);
      activeRenderer.dispose();
      app.logger.info('Quiz finished');
    } catch (error) {
      renderer?.dispose();
      const suggestions = error instanceof RecallError && error.hint
        ? [error.hint]
        : [
            'Check your .env file (DEFAULT_PROVIDER, OPENAI_API_KEY, ARTICLES_DIR)',
            `Run ${style.command('recall check')} to verify Ollama and your notes`,
          ];
      console.error(formatError(errorMessage(error), suggestions));
      process.exit(1);
    }
  });
