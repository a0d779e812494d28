import { Command } from 'commander';
import { loadSettingsFromEnvironment } from '../../config/index.js';
import { errorMessage } from '../../errors.js';
import { OllamaProvider } from '../../providers/ollama-provider.js';
import { isModelInstalled } from '../../readiness/prober.js';
import { bullet, formatError, icons, style, subheader } from '../theme.js';

export const modelsCommand = new Command('models')
  .description('List models installed in the local Ollama server')
  .action(async () => {
    try {
      const settings = loadSettingsFromEnvironment();
      const ollama = new OllamaProvider({ model: settings.modelName, host: settings.ollamaHost });
      const models = await ollama.listModels();

      console.log(subheader(`Installed Models (${style.number(String(models.length))})`));
      for (const name of models) {
        const marker = isModelInstalled(settings.modelName, [name]) ? ` ${style.success(icons.success)} ${style.dim('configured')}` : '';
        console.log(bullet(`${name}${marker}`));
      }
      if (!isModelInstalled(settings.modelName, models)) {
        console.log(`\n${style.warning(icons.warning)} ${settings.modelName} is not installed; ${style.command('recall check')} will pull it.`);
      }
      console.log();
    } catch (error) {
      console.error(formatError(errorMessage(error), [
        "Make sure Ollama is running ('ollama serve')",
        'Check OLLAMA_HOST if the server is not on the default port',
      ]));
      process.exit(1);
    }
  });
