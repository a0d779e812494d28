import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { ProviderIdentity } from '../providers/types.js';

export const DEFAULT_MODEL_NAME = 'gemma2:2b';
export const DEFAULT_OPENAI_MODEL_NAME = 'gpt-4.1-mini';
export const DEFAULT_ARTICLES_DIR = './articles';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type ProviderName = 'openai' | 'ollama';

const PROVIDER_BY_NAME: Record<ProviderName, ProviderIdentity> = {
  ollama: 'LOCAL',
  openai: 'CLOUD',
};

const envSchema = z
  .object({
    MODEL_NAME: z.string().trim().min(1).default(DEFAULT_MODEL_NAME),
    OPENAI_MODEL_NAME: z.string().trim().min(1).default(DEFAULT_OPENAI_MODEL_NAME),
    OPENAI_API_KEY: z.string().trim().default(''),
    DEFAULT_PROVIDER: z.enum(['openai', 'ollama']).default('ollama'),
    ARTICLES_DIR: z.string().trim().min(1).default(DEFAULT_ARTICLES_DIR),
    OLLAMA_HOST: z.string().trim().min(1).default('http://127.0.0.1:11434'),
    LOG_FILE: z.string().trim().min(1).default('debug.log'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.DEFAULT_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: 'custom',
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY must be set when DEFAULT_PROVIDER is openai',
      });
    }
  });

export interface Settings {
  readonly modelName: string;
  readonly openaiModelName: string;
  readonly openaiApiKey: string;
  readonly defaultProvider: ProviderIdentity;
  /** Absolute path of the markdown corpus */
  readonly articlesDir: string;
  readonly ollamaHost: string;
  readonly logFile: string;
  readonly logLevel: LogLevel;
}

export type Environment = Record<string, string | undefined>;

/**
 * Build the settings once from the environment. Empty variables count as
 * unset so a blank line in .env falls back to the default.
 */
export function loadSettings(env: Environment = process.env, cwd: string = process.cwd()): Settings {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value;
    }
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'environment'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`, {
      cause: parsed.error,
      hint: 'Check your .env file or exported environment variables',
    });
  }

  const data = parsed.data;
  return Object.freeze({
    modelName: data.MODEL_NAME,
    openaiModelName: data.OPENAI_MODEL_NAME,
    openaiApiKey: data.OPENAI_API_KEY,
    defaultProvider: PROVIDER_BY_NAME[data.DEFAULT_PROVIDER],
    articlesDir: path.resolve(cwd, data.ARTICLES_DIR),
    ollamaHost: data.OLLAMA_HOST,
    logFile: path.resolve(cwd, data.LOG_FILE),
    logLevel: data.LOG_LEVEL,
  });
}

export interface SettingsOverrides {
  provider?: string;
  model?: string;
  articles?: string;
}

/**
 * Apply command-line flags on top of loaded settings, re-checking the
 * provider/credential pairing.
 */
export function withOverrides(settings: Settings, overrides: SettingsOverrides, cwd: string = process.cwd()): Settings {
  let defaultProvider = settings.defaultProvider;
  if (overrides.provider !== undefined) {
    defaultProvider = parseProviderName(overrides.provider);
  }
  if (defaultProvider === 'CLOUD' && !settings.openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY must be set when DEFAULT_PROVIDER is openai', {
      hint: 'Export OPENAI_API_KEY or pick --provider ollama',
    });
  }

  return Object.freeze({
    ...settings,
    defaultProvider,
    modelName: overrides.model ?? settings.modelName,
    articlesDir: overrides.articles ? path.resolve(cwd, overrides.articles) : settings.articlesDir,
  });
}

export function parseProviderName(name: string): ProviderIdentity {
  const normalized = name.trim().toLowerCase();
  if (normalized === 'ollama' || normalized === 'openai') {
    return PROVIDER_BY_NAME[normalized];
  }
  throw new ConfigurationError(`Unknown provider '${name}' (expected openai or ollama)`);
}
