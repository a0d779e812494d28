import { Command } from 'commander';
import { createApp } from '../../app.js';
import { loadSettingsFromEnvironment, withOverrides } from '../../config/index.js';
import { RecallError, errorMessage } from '../../errors.js';
import { PROVIDER_LABELS } from '../../providers/types.js';
import { formatError, header, keyValue, step, style } from '../theme.js';

export const checkCommand = new Command('check')
  .description('Verify the provider, the local model and the notes directory')
  .option('-p, --provider <name>', 'Provider to check (ollama or openai)')
  .option('-m, --model <name>', 'Local model name, overriding MODEL_NAME')
  .option('-a, --articles <dir>', 'Directory of markdown notes, overriding ARTICLES_DIR')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('recall check')}                 ${style.dim('Start Ollama if needed and pull the model')}
  ${style.command('recall check -m llama3:8b')}    ${style.dim('Check (and pull) a different model')}
`)
  .action(async (options: { provider?: string; model?: string; articles?: string }) => {
    try {
      const settings = withOverrides(loadSettingsFromEnvironment(), options);
      const app = createApp(settings);

      console.log(header(`Readiness: ${PROVIDER_LABELS[settings.defaultProvider]}`));
      console.log(keyValue('Notes', style.path(settings.articlesDir)));
      console.log();

      app.prober.onTransition((state, message) => {
        if (state === 'FAILED') {
          console.log(step(message, 'error'));
        } else if (state === 'READY' || state === 'SERVICE_UP' || state === 'MODEL_PRESENT') {
          console.log(step(message, 'done'));
        } else {
          console.log(step(message, 'running'));
        }
      });

      const report = await app.prober.probe(settings.defaultProvider);
      if (report.state !== 'READY') {
        console.error(formatError(report.message, report.error?.hint ? [report.error.hint] : undefined));
        process.exit(1);
      }
      console.log(`\n${style.success('All set.')} Run ${style.command('recall quiz')} to start.\n`);
    } catch (error) {
      console.error(formatError(
        errorMessage(error),
        error instanceof RecallError && error.hint ? [error.hint] : ['Check your .env file']
      ));
      process.exit(1);
    }
  });
