import type { ConversationMessage, ModelToolCall } from '../../../shared/types.js';
import type { ToolSpec } from '../tools/definitions.js';

export interface ModelRequest {
  messages: ConversationMessage[];
  tools: ToolSpec[];
}

export interface ModelResponse {
  text: string;
  toolCalls: ModelToolCall[];
}

export type ModelStreamEvent = { type: 'text'; delta: string } | { type: 'done'; response: ModelResponse };

/**
 * Language-model boundary: a cancellable stream of text fragments ending in
 * one `done` event with the structured response. Implementations fail with
 * ProviderUnavailableError or InvalidModelRequestError, and with
 * CancelledError once `signal` aborts.
 */
export interface LanguageModel {
  readonly name: string;
  stream(request: ModelRequest, signal?: AbortSignal): AsyncIterable<ModelStreamEvent>;
}
