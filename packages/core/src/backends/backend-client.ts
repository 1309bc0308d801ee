import {
  BackendKind, BackendRequest, ChatMessage, CHAT_ROLES, CompletionUsage, RoundResult,
} from '../types/backend.types';
import { DEFAULT_MAX_CONCURRENCY, DEFAULT_TIMEOUT_MS } from '../types/config.types';
import { BackendCallError, BackendConfigError, BACKEND_CALL_ERROR_KINDS, getErrorMessage, InvalidRequestError } from '../utils/errors';
import { defaultLogger, Logger } from '../utils/logger';
import { settleWithConcurrencyLimit } from '../utils/promise';

/**
 * Normalized vendor response, before it is folded into a RoundResult.
 */
export interface CompletionResponse {
  text: string;
  usage?: CompletionUsage;
}

/**
 * One request/response exchange against one inference endpoint.
 *
 * `complete` never throws for network or vendor failures: they come back as a
 * result with `error` set and empty `content`. It does throw for caller contract
 * violations (both or neither of `messages`/`prompt`, or use outside `open()`).
 */
export interface BackendClient {
  readonly kind: BackendKind;
  open(): Promise<void>;
  close(): Promise<void>;
  isOpen(): boolean;
  complete(request: BackendRequest): Promise<RoundResult>;
  completeParallel(requests: readonly BackendRequest[]): Promise<RoundResult[]>;
}

export interface BackendClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxConcurrency?: number;
  logger?: Logger;
}

/**
 * Checks that a request carries exactly one of `messages` or `prompt`.
 *
 * @throws {InvalidRequestError} When both or neither are present.
 */
export function validateRequest(request: BackendRequest): void {
  const hasMessages = request.messages !== undefined;
  const hasPrompt = request.prompt !== undefined;
  if (hasMessages === hasPrompt) {
    throw new InvalidRequestError(
      `Request for '${request.alias}' must have exactly one of messages or prompt`
    );
  }
}

/**
 * Gets the messages to send: the request's own, or a single user message built from `prompt`.
 */
export function getMessages(request: BackendRequest): ChatMessage[] {
  return request.messages ?? [{ role: CHAT_ROLES.USER, content: request.prompt ?? '' }];
}

/**
 * Builds an errored result for a request that never produced content.
 */
export function erroredResult(request: BackendRequest, error: string, latencyMs: number = 0): RoundResult {
  return Object.freeze({
    alias: request.alias,
    modelId: request.modelId,
    roundNumber: request.roundNumber,
    role: request.role,
    content: '',
    error,
    latencyMs,
    timestamp: new Date(),
  });
}

/**
 * Shared lifecycle, timing, timeout and error folding for backend clients.
 * Subclasses only implement `send`, the raw vendor exchange.
 */
export abstract class BaseBackendClient implements BackendClient {
  abstract readonly kind: BackendKind;

  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  protected readonly timeoutMs: number;
  protected readonly maxConcurrency: number;
  protected readonly logger: Logger;
  private opened = false;

  protected constructor(options: BackendClientOptions, defaultBaseUrl: string) {
    if (!options.apiKey || options.apiKey.trim() === '') {
      throw new BackendConfigError(`API key is required for ${new.target.name}`);
    }
    const baseUrl = options.baseUrl ?? defaultBaseUrl;
    try {
      new URL(baseUrl);
    } catch (error: unknown) {
      throw new BackendConfigError(`Invalid base URL for ${new.target.name}: ${baseUrl} (${getErrorMessage(error)})`);
    }
    const maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new BackendConfigError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }
    this.apiKey = options.apiKey;
    this.baseUrl = baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxConcurrency = maxConcurrency;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Performs the vendor exchange. Implementations throw on any failure; the
   * base class turns the failure into an errored result.
   */
  protected abstract send(modelId: string, messages: ChatMessage[], signal: AbortSignal): Promise<CompletionResponse>;

  /**
   * Classifies a failure thrown by `send`. The default treats anything that is
   * not already a BackendCallError as a transport failure.
   */
  protected toCallError(error: unknown): BackendCallError {
    if (error instanceof BackendCallError) {
      return error;
    }
    return new BackendCallError(`Transport error: ${getErrorMessage(error)}`, BACKEND_CALL_ERROR_KINDS.TRANSPORT);
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  isOpen(): boolean {
    return this.opened;
  }

  async complete(request: BackendRequest): Promise<RoundResult> {
    validateRequest(request);
    this.assertOpen();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();

    try {
      const response = await this.send(request.modelId, getMessages(request), controller.signal);
      const latencyMs = Date.now() - startedAt;
      this.logger.memberAction(request.alias, `${this.kind} responded in ${latencyMs}ms`);
      return Object.freeze({
        alias: request.alias,
        modelId: request.modelId,
        roundNumber: request.roundNumber,
        role: request.role,
        content: response.text,
        ...(response.usage !== undefined && { usage: response.usage }),
        latencyMs,
        timestamp: new Date(),
      });
    } catch (error: unknown) {
      const latencyMs = Date.now() - startedAt;
      const callError = controller.signal.aborted
        ? new BackendCallError(`Request timed out after ${this.timeoutMs}ms`, BACKEND_CALL_ERROR_KINDS.TIMEOUT)
        : this.toCallError(error);
      this.logger.memberAction(request.alias, `${this.kind} ${callError.kind} failure: ${callError.message}`);
      return erroredResult(request, callError.message, latencyMs);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Runs all requests concurrently, at most `maxConcurrency` in flight. Output
   * order matches input order and one failure never cancels the others.
   */
  async completeParallel(requests: readonly BackendRequest[]): Promise<RoundResult[]> {
    requests.forEach(validateRequest);
    this.assertOpen();

    const settled = await settleWithConcurrencyLimit(
      requests.map((request) => () => this.complete(request)),
      this.maxConcurrency
    );
    return settled.map((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const request = requests[index];
      if (request === undefined) {
        throw new Error(`No request at index ${index}`);
      }
      return erroredResult(request, getErrorMessage(outcome.reason));
    });
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new InvalidRequestError(`${this.kind} client used outside open()/close()`);
    }
  }
}
