import { config as loadDotenv } from 'dotenv';
import { loadSettings, type Settings } from './settings.js';

export {
  loadSettings,
  withOverrides,
  parseProviderName,
  DEFAULT_MODEL_NAME,
  DEFAULT_OPENAI_MODEL_NAME,
  DEFAULT_ARTICLES_DIR,
} from './settings.js';
export type { Settings, SettingsOverrides, Environment, LogLevel, ProviderName } from './settings.js';

/**
 * Read `.env` from the working directory (without overriding variables that
 * are already exported) and build the settings from the result.
 */
export function loadSettingsFromEnvironment(envFile = '.env'): Settings {
  loadDotenv({ path: envFile });
  return loadSettings(process.env);
}
