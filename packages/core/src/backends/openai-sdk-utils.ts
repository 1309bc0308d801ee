import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import { ChatMessage, CHAT_ROLES, CompletionUsage } from '../types/backend.types';
import { isRecord } from '../utils/common';

/**
 * Usage information from Chat Completions API (supports both prompt_tokens/completion_tokens and input_tokens/output_tokens).
 */
export interface ChatCompletionUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
  input_tokens?: number;
  output_tokens?: number;
}

/**
 * Converts usage from Chat Completions API format to CompletionUsage.
 *
 * @param usage - Usage object from Chat Completions API response.
 * @returns CompletionUsage object, or undefined if usage is not provided.
 */
export function convertChatUsage(usage?: ChatCompletionUsage | null): CompletionUsage | undefined {
  if (!usage) {
    return undefined;
  }
  const result: CompletionUsage = {};
  const inputTokens = usage.prompt_tokens ?? usage.input_tokens;
  const outputTokens = usage.completion_tokens ?? usage.output_tokens;
  const totalTokens = usage.total_tokens ?? (inputTokens != null && outputTokens != null ? inputTokens + outputTokens : undefined);

  if (inputTokens != null) result.inputTokens = inputTokens;
  if (outputTokens != null) result.outputTokens = outputTokens;
  if (totalTokens != null) result.totalTokens = totalTokens;

  return result;
}

/**
 * Maps our chat messages onto the SDK's message param union.
 */
export function toChatCompletionMessages(messages: readonly ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case CHAT_ROLES.SYSTEM:
        return { role: 'system', content: message.content };
      case CHAT_ROLES.ASSISTANT:
        return { role: 'assistant', content: message.content };
      case CHAT_ROLES.USER:
        return { role: 'user', content: message.content };
    }
  });
}

/**
 * Reads the HTTP status from an SDK error, if it carries one.
 * Errors from the openai SDK expose `status` for vendor (non-2xx) responses only.
 */
export function getHttpStatus(error: unknown): number | undefined {
  if (isRecord(error) && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
