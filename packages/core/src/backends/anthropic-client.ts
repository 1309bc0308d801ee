import { BACKEND_KINDS, ChatMessage, CHAT_ROLES, CompletionUsage } from '../types/backend.types';
import { isRecord } from '../utils/common';
import { BackendCallError, BACKEND_CALL_ERROR_KINDS } from '../utils/errors';

import { BackendClientOptions, BaseBackendClient, CompletionResponse } from './backend-client';

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1';
const ANTHROPIC_API_VERSION = '2023-06-01';

/** The Messages API requires max_tokens on every request. */
export const ANTHROPIC_DEFAULT_MAX_TOKENS = 4096;

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

interface AnthropicRequest {
  model: string;
  messages: AnthropicMessage[];
  max_tokens: number;
  system?: string;
}

export interface AnthropicClientOptions extends BackendClientOptions {
  maxTokens?: number;
}

/**
 * Splits chat messages into the Messages API shape: system messages are hoisted
 * into the top-level `system` field (joined by blank lines), the rest stay in order.
 */
export function toAnthropicRequest(modelId: string, messages: readonly ChatMessage[], maxTokens: number): AnthropicRequest {
  const system: string[] = [];
  const turns: AnthropicMessage[] = [];
  for (const message of messages) {
    if (message.role === CHAT_ROLES.SYSTEM) {
      system.push(message.content);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }
  return {
    model: modelId,
    messages: turns,
    max_tokens: maxTokens,
    ...(system.length > 0 && { system: system.join('\n\n') }),
  };
}

/**
 * Reads text and usage out of a Messages API response body. Text blocks are
 * concatenated; other block types are ignored.
 */
export function parseAnthropicResponse(body: unknown): CompletionResponse {
  if (!isRecord(body) || !Array.isArray(body.content)) {
    throw new BackendCallError('Unexpected Anthropic response shape', BACKEND_CALL_ERROR_KINDS.VENDOR);
  }
  const text = body.content
    .map((block: unknown) => (isRecord(block) && block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
    .join('');

  const usage = parseUsage(body.usage);
  return {
    text,
    ...(usage !== undefined && { usage }),
  };
}

function parseUsage(raw: unknown): CompletionUsage | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const usage: CompletionUsage = {};
  if (typeof raw.input_tokens === 'number') usage.inputTokens = raw.input_tokens;
  if (typeof raw.output_tokens === 'number') usage.outputTokens = raw.output_tokens;
  if (usage.inputTokens !== undefined && usage.outputTokens !== undefined) {
    usage.totalTokens = usage.inputTokens + usage.outputTokens;
  }
  return usage;
}

function vendorErrorMessage(status: number, body: unknown): string {
  if (isRecord(body) && isRecord(body.error) && typeof body.error.message === 'string') {
    return `HTTP ${status}: ${body.error.message}`;
  }
  return `HTTP ${status}`;
}

/**
 * Anthropic Messages API client over `fetch`.
 */
export class AnthropicClient extends BaseBackendClient {
  readonly kind = BACKEND_KINDS.ANTHROPIC;
  private readonly maxTokens: number;

  constructor(options: AnthropicClientOptions) {
    super(options, ANTHROPIC_BASE_URL);
    this.maxTokens = options.maxTokens ?? ANTHROPIC_DEFAULT_MAX_TOKENS;
  }

  protected async send(modelId: string, messages: ChatMessage[], signal: AbortSignal): Promise<CompletionResponse> {
    const response = await fetch(`${this.baseUrl.replace(/\/+$/, '')}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_API_VERSION,
      },
      body: JSON.stringify(toAnthropicRequest(modelId, messages, this.maxTokens)),
      signal,
    });

    const body: unknown = await response.json().catch(() => undefined);
    if (!response.ok) {
      throw new BackendCallError(vendorErrorMessage(response.status, body), BACKEND_CALL_ERROR_KINDS.VENDOR, response.status);
    }
    return parseAnthropicResponse(body);
  }
}
