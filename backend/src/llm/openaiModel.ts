import OpenAI from 'openai';
import type { Logger } from 'pino';
import type { ConversationMessage, ModelToolCall } from '../../../shared/types.js';
import { CancelledError, errorMessage, InvalidModelRequestError, ProviderUnavailableError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import type { LanguageModel, ModelRequest, ModelStreamEvent } from './languageModel.js';

export interface OpenAIChatModelOptions {
  model: string;
  apiKey?: string;
  baseURL?: string;
  temperature?: number;
  maxTokens?: number;
  client?: OpenAI;
  logger?: Logger;
}

export function toOpenAIMessages(messages: ConversationMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        return message.toolCalls?.length
          ? {
              role: 'assistant',
              content: message.content || null,
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: 'function' as const,
                function: { name: call.name, arguments: call.arguments }
              }))
            }
          : { role: 'assistant', content: message.content };
      case 'tool':
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    }
  });
}

function mapProviderError(error: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted || error instanceof OpenAI.APIUserAbortError) {
    return new CancelledError();
  }
  if (
    error instanceof OpenAI.BadRequestError ||
    error instanceof OpenAI.UnprocessableEntityError ||
    error instanceof OpenAI.NotFoundError
  ) {
    return new InvalidModelRequestError(`Model rejected the request: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    return new ProviderUnavailableError(`Model provider error: ${error.message}`, {
      cause: error,
      status: error.status
    });
  }
  return new ProviderUnavailableError(`Model provider unreachable: ${errorMessage(error)}`, { cause: error });
}

/** Streams chat completions from any OpenAI-compatible endpoint. */
export class OpenAIChatModel implements LanguageModel {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly temperature?: number;
  private readonly maxTokens?: number;
  private readonly logger: Logger;

  constructor(options: OpenAIChatModelOptions) {
    this.name = options.model;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey ?? 'unused', baseURL: options.baseURL });
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.logger = options.logger ?? createComponentLogger('model');
  }

  async *stream(request: ModelRequest, signal?: AbortSignal): AsyncIterable<ModelStreamEvent> {
    const partialCalls = new Map<number, ModelToolCall>();
    let text = '';

    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.name,
          messages: toOpenAIMessages(request.messages),
          tools: request.tools.length ? request.tools : undefined,
          temperature: this.temperature,
          max_tokens: this.maxTokens,
          stream: true
        },
        { signal }
      );

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta;
        if (!delta) {
          continue;
        }
        if (delta.content) {
          text += delta.content;
          yield { type: 'text', delta: delta.content };
        }
        for (const call of delta.tool_calls ?? []) {
          const existing = partialCalls.get(call.index) ?? { id: '', name: '', arguments: '' };
          if (call.id) existing.id = call.id;
          if (call.function?.name) existing.name += call.function.name;
          if (call.function?.arguments) existing.arguments += call.function.arguments;
          partialCalls.set(call.index, existing);
        }
      }
    } catch (error) {
      const mapped = mapProviderError(error, signal);
      if (!(mapped instanceof CancelledError)) {
        this.logger.warn({ err: error, model: this.name }, 'model call failed');
      }
      throw mapped;
    }

    const toolCalls = Array.from(partialCalls.entries())
      .sort(([a], [b]) => a - b)
      .map(([index, call]) => ({ ...call, id: call.id || `call_${index}` }));

    yield { type: 'done', response: { text, toolCalls } };
  }
}
