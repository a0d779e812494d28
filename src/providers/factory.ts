import type { Settings } from '../config/settings.js';
import { OllamaProvider } from './ollama-provider.js';
import { OpenAIProvider } from './openai-provider.js';

export interface ProviderClients {
  local: OllamaProvider;
  /** Absent when no OpenAI key is configured */
  cloud?: OpenAIProvider;
}

export function createProviderClients(settings: Settings): ProviderClients {
  const local = new OllamaProvider({ model: settings.modelName, host: settings.ollamaHost });
  const cloud = settings.openaiApiKey
    ? new OpenAIProvider({ model: settings.openaiModelName, apiKey: settings.openaiApiKey })
    : undefined;
  return { local, cloud };
}
