import OpenAI from 'openai';
import { BackendError, BackendUnreachableError, ConfigurationError, errorMessage } from '../errors.js';
import { httpStatusOf, isConnectionError } from './connection.js';
import type { ChatMessage, Conversation, ProviderClient, ResponseFormatDirective } from './types.js';
import { NO_FORMAT } from './types.js';

export interface OpenAIChatRequest {
  model: string;
  messages: ChatMessage[];
  response_format?: { type: 'json_object' };
}

/**
 * The chat-completions surface of the openai SDK used here.
 */
export interface OpenAIChatApi {
  chat: {
    completions: {
      create(body: OpenAIChatRequest): Promise<{
        choices: { message: { content: string | null } }[];
      }>;
    };
  };
}

export interface OpenAIProviderOptions {
  model: string;
  apiKey: string;
  api?: OpenAIChatApi;
}

export class OpenAIProvider implements ProviderClient {
  readonly identity = 'CLOUD' as const;
  readonly modelName: string;
  private api: OpenAIChatApi;

  constructor(options: OpenAIProviderOptions) {
    this.modelName = options.model;
    if (options.api) {
      this.api = options.api;
    } else {
      if (!options.apiKey.trim()) {
        throw new ConfigurationError('OPENAI_API_KEY must be set to use the OpenAI provider');
      }
      this.api = new OpenAI({ apiKey: options.apiKey });
    }
  }

  async sendChat(conversation: Conversation, format: ResponseFormatDirective = NO_FORMAT): Promise<string> {
    const request: OpenAIChatRequest = {
      model: this.modelName,
      messages: conversation.map(m => ({ role: m.role, content: m.content })),
    };
    const responseFormat = toOpenAIFormat(format);
    if (responseFormat) {
      request.response_format = responseFormat;
    }

    let content: string | null | undefined;
    try {
      const completion = await this.api.chat.completions.create(request);
      content = completion.choices[0]?.message.content;
    } catch (error) {
      if (isConnectionError(error)) {
        throw new BackendUnreachableError('CLOUD', `OpenAI is not reachable: ${errorMessage(error)}`, {
          cause: error,
          hint: 'Check your network connection',
        });
      }
      throw new BackendError('CLOUD', `OpenAI chat failed: ${errorMessage(error)}`, {
        cause: error,
        status: httpStatusOf(error),
      });
    }

    if (!content) {
      throw new BackendError('CLOUD', 'OpenAI returned an empty completion');
    }
    return content;
  }
}

/**
 * OpenAI's json_object mode cannot pin field names, so a schema directive
 * degrades to plain JSON and validation happens after the call.
 */
export function toOpenAIFormat(format: ResponseFormatDirective): { type: 'json_object' } | undefined {
  return format.kind === 'none' ? undefined : { type: 'json_object' };
}
