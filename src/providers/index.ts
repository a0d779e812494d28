export type {
  ProviderIdentity,
  MessageRole,
  ChatMessage,
  Conversation,
  JsonSchema,
  ResponseFormatDirective,
  ProviderClient,
  LocalModelAdmin,
} from './types.js';

export { NO_FORMAT, JSON_FORMAT, PROVIDER_LABELS } from './types.js';
export { OllamaProvider, toOllamaFormat, DEFAULT_OLLAMA_HOST } from './ollama-provider.js';
export type { OllamaApi, OllamaProviderOptions } from './ollama-provider.js';
export { OpenAIProvider, toOpenAIFormat } from './openai-provider.js';
export type { OpenAIChatApi, OpenAIChatRequest, OpenAIProviderOptions } from './openai-provider.js';
export { isConnectionError, httpStatusOf } from './connection.js';
export { createProviderClients } from './factory.js';
export type { ProviderClients } from './factory.js';
