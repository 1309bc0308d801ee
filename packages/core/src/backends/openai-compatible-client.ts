import OpenAI from 'openai';

import { BackendKind, ChatMessage } from '../types/backend.types';
import { BackendCallError, BACKEND_CALL_ERROR_KINDS, getErrorMessage } from '../utils/errors';

import { BackendClientOptions, BaseBackendClient, CompletionResponse } from './backend-client';
import { convertChatUsage, getHttpStatus, toChatCompletionMessages } from './openai-sdk-utils';

export interface OpenAICompatibleClientOptions extends BackendClientOptions {
  /** Extra headers sent with every request (e.g. aggregator attribution). */
  defaultHeaders?: Record<string, string>;
}

/**
 * Backend client for every endpoint that speaks the OpenAI Chat Completions API:
 * OpenAI itself, the aggregator, and the OpenAI-compatible endpoints of Google, xAI and Groq.
 *
 * The SDK's own retries are disabled; each call is attempted exactly once and
 * its timeout is enforced by the base class's abort signal.
 */
export class OpenAICompatibleClient extends BaseBackendClient {
  readonly kind: BackendKind;
  private readonly client: OpenAI;

  constructor(kind: BackendKind, options: OpenAICompatibleClientOptions, defaultBaseUrl: string) {
    super(options, defaultBaseUrl);
    this.kind = kind;
    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      maxRetries: 0,
      ...(options.defaultHeaders !== undefined && { defaultHeaders: options.defaultHeaders }),
    });
  }

  protected async send(modelId: string, messages: ChatMessage[], signal: AbortSignal): Promise<CompletionResponse> {
    const completion = await this.client.chat.completions.create(
      { model: modelId, messages: toChatCompletionMessages(messages) },
      { signal }
    );
    const text = completion.choices[0]?.message?.content ?? '';
    const usage = convertChatUsage(completion.usage);
    return {
      text,
      ...(usage !== undefined && { usage }),
    };
  }

  protected override toCallError(error: unknown): BackendCallError {
    const status = getHttpStatus(error);
    if (status !== undefined) {
      return new BackendCallError(`HTTP ${status}: ${getErrorMessage(error)}`, BACKEND_CALL_ERROR_KINDS.VENDOR, status);
    }
    return super.toCallError(error);
  }
}
