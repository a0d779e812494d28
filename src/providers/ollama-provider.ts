import { Ollama } from 'ollama';
import { BackendError, BackendUnreachableError, errorMessage } from '../errors.js';
import { httpStatusOf, isConnectionError } from './connection.js';
import type {
  ChatMessage,
  Conversation,
  LocalModelAdmin,
  ProviderClient,
  ResponseFormatDirective,
} from './types.js';
import { NO_FORMAT } from './types.js';

export const DEFAULT_OLLAMA_HOST = 'http://127.0.0.1:11434';

/**
 * The slice of the ollama client this provider talks to. `Ollama` satisfies
 * it structurally; tests pass fakes.
 */
export interface OllamaApi {
  chat(request: {
    model: string;
    messages: ChatMessage[];
    format?: string | object;
    stream?: false;
  }): Promise<{ message: { content: string } }>;
  list(): Promise<{ models: { name: string; model: string }[] }>;
  pull(request: { model: string; stream?: false }): Promise<{ status: string }>;
}

export interface OllamaProviderOptions {
  model: string;
  host?: string;
  api?: OllamaApi;
}

export class OllamaProvider implements ProviderClient, LocalModelAdmin {
  readonly identity = 'LOCAL' as const;
  readonly modelName: string;
  private api: OllamaApi;

  constructor(options: OllamaProviderOptions) {
    this.modelName = options.model;
    this.api = options.api ?? new Ollama({ host: options.host || DEFAULT_OLLAMA_HOST });
  }

  async sendChat(conversation: Conversation, format: ResponseFormatDirective = NO_FORMAT): Promise<string> {
    try {
      const response = await this.api.chat({
        model: this.modelName,
        messages: conversation.map(m => ({ role: m.role, content: m.content })),
        format: toOllamaFormat(format),
        stream: false,
      });
      return response.message.content;
    } catch (error) {
      throw this.wrap('chat', error);
    }
  }

  async isReachable(): Promise<boolean> {
    try {
      await this.api.list();
      return true;
    } catch (error) {
      if (isConnectionError(error)) {
        return false;
      }
      throw this.wrap('list', error);
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const { models } = await this.api.list();
      return models.map(m => m.model || m.name);
    } catch (error) {
      throw this.wrap('list', error);
    }
  }

  async pullModel(name: string): Promise<void> {
    try {
      await this.api.pull({ model: name, stream: false });
    } catch (error) {
      throw this.wrap('pull', error);
    }
  }

  private wrap(operation: string, error: unknown): BackendError {
    if (error instanceof BackendError) {
      return error;
    }
    if (isConnectionError(error)) {
      return new BackendUnreachableError('LOCAL', `Ollama is not reachable (${operation}): ${errorMessage(error)}`, {
        cause: error,
        hint: "Start the server with 'ollama serve'",
      });
    }
    return new BackendError('LOCAL', `Ollama ${operation} failed: ${errorMessage(error)}`, {
      cause: error,
      status: httpStatusOf(error),
    });
  }
}

export function toOllamaFormat(format: ResponseFormatDirective): string | object | undefined {
  switch (format.kind) {
    case 'none':
      return undefined;
    case 'json':
      return 'json';
    case 'schema':
      return format.schema;
  }
}
