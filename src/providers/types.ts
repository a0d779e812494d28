export type ProviderIdentity = 'LOCAL' | 'CLOUD';

export type MessageRole = 'system' | 'user';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export type Conversation = readonly ChatMessage[];

export type JsonSchema = Record<string, unknown>;

/**
 * Hint asking a backend to shape its output. Strength of the guarantee
 * depends on the provider, so callers re-validate whatever comes back.
 */
export type ResponseFormatDirective =
  | { kind: 'none' }
  | { kind: 'json' }
  | { kind: 'schema'; name: string; schema: JsonSchema };

export const NO_FORMAT: ResponseFormatDirective = { kind: 'none' };
export const JSON_FORMAT: ResponseFormatDirective = { kind: 'json' };

export interface ProviderClient {
  readonly identity: ProviderIdentity;
  readonly modelName: string;

  /**
   * Send a conversation and return the raw completion text.
   * Rejects with a BackendError carrying the underlying cause.
   */
  sendChat(conversation: Conversation, format?: ResponseFormatDirective): Promise<string>;
}

/**
 * Model management operations only the local server offers.
 */
export interface LocalModelAdmin {
  readonly modelName: string;
  isReachable(): Promise<boolean>;
  listModels(): Promise<string[]>;
  pullModel(name: string): Promise<void>;
}

export const PROVIDER_LABELS: Record<ProviderIdentity, string> = {
  LOCAL: 'Ollama',
  CLOUD: 'OpenAI',
};
