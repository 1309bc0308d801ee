import fs from 'fs';
import os from 'os';
import path from 'path';

import { BackendClient, erroredResult } from '../backends/backend-client';
import { DEFAULT_MODEL_CATALOG } from '../config/defaults';
import type { Dispatcher } from '../dispatch/batch-dispatcher';
import { DEFAULT_PROMPT_TEMPLATES } from '../prompts/debate-prompts';
import type { RoutingInputs } from '../routing/routing-resolver';
import { GuardedHooks } from '../state-machine/guarded-hooks';
import type { NodeContext } from '../state-machine/node';
import type { BackendKind, BackendRequest, RoundResult, RoutedRequest } from '../types/backend.types';
import { RESULT_ROLES, ROUTING_MODES } from '../types/backend.types';
import { DebateRound, DebateState, ROUND_TYPES } from '../types/debate.types';

import { getErrorMessage } from './errors';
import { Logger } from './logger';

/**
 * Creates a temporary directory for testing and returns a cleanup function.
 *
 * @param prefix - Optional prefix for the temporary directory name (default: 'test-')
 */
export function createTempDir(prefix: string = 'test-'): { tmpDir: string; cleanup: () => void } {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    tmpDir,
    cleanup: (): void => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}

/**
 * Logger whose methods are jest mocks, so tests can assert on what was logged
 * without writing to stderr.
 */
export function createMockLogger(verbose: boolean = false): Logger {
  const logger = new Logger(verbose);
  jest.spyOn(logger, 'info').mockImplementation(() => undefined);
  jest.spyOn(logger, 'success').mockImplementation(() => undefined);
  jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  jest.spyOn(logger, 'error').mockImplementation(() => undefined);
  jest.spyOn(logger, 'debug').mockImplementation(() => undefined);
  jest.spyOn(logger, 'memberAction').mockImplementation(() => undefined);
  return logger;
}

/**
 * Routing inputs with the built-in catalog and every native key present, so
 * each built-in alias routes to its own backend under `auto`.
 */
export function createRoutingInputs(overrides: Partial<RoutingInputs> = {}): RoutingInputs {
  return {
    catalog: DEFAULT_MODEL_CATALOG,
    routing: { defaultMode: ROUTING_MODES.AUTO, overrides: {} },
    credentials: {
      anthropic: 'test-secret',
      openai: 'test-secret',
      google: 'test-secret',
      xai: 'test-secret',
      openrouter: 'test-secret',
    },
    ...overrides,
  };
}

/**
 * Produces the content for one request, or throws to make that call fail.
 */
export type Responder = (request: RoutedRequest) => string | Promise<string>;

/**
 * In-process dispatcher that answers every request through a responder and
 * records each batch it was given.
 */
export class ScriptedDispatcher implements Dispatcher {
  readonly batches: RoutedRequest[][] = [];

  constructor(private readonly respond: Responder) {}

  async dispatch(requests: readonly RoutedRequest[]): Promise<RoundResult[]> {
    this.batches.push([...requests]);
    return Promise.all(requests.map(async (request): Promise<RoundResult> => {
      try {
        const content = await this.respond(request);
        return {
          alias: request.alias,
          modelId: request.modelId,
          roundNumber: request.roundNumber,
          role: request.role,
          content,
          latencyMs: 1,
          timestamp: new Date(),
          routing: request.routing,
        };
      } catch (error: unknown) {
        return { ...erroredResult(request, getErrorMessage(error)), routing: request.routing };
      }
    }));
  }

  /** Every request dispatched so far, in dispatch order. */
  get requests(): RoutedRequest[] {
    return this.batches.flat();
  }
}

/**
 * Backend client stand-in: answers `reply:<alias>` after a per-alias delay, and
 * fails the aliases it is told to.
 */
export class FakeBackendClient implements BackendClient {
  readonly received: BackendRequest[] = [];
  private opened = false;

  constructor(
    readonly kind: BackendKind,
    private readonly behavior: { delayMs?: Record<string, number>; failAliases?: string[] } = {}
  ) {}

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
    this.received.push(request);
    const delayMs = this.behavior.delayMs?.[request.alias] ?? 0;
    await new Promise((resolve) => setTimeout(resolve, delayMs));
    if (this.behavior.failAliases?.includes(request.alias)) {
      return erroredResult(request, `HTTP 500: ${this.kind} unavailable`, delayMs);
    }
    return {
      alias: request.alias,
      modelId: request.modelId,
      roundNumber: request.roundNumber,
      role: request.role,
      content: `reply:${request.alias}`,
      latencyMs: delayMs,
      timestamp: new Date(),
    };
  }

  completeParallel(requests: readonly BackendRequest[]): Promise<RoundResult[]> {
    return Promise.all(requests.map((request) => this.complete(request)));
  }
}

/**
 * Node context over a scripted dispatcher, for exercising single nodes.
 */
export function createNodeContext(state: DebateState, dispatcher: Dispatcher = new ScriptedDispatcher(() => 'ok')): NodeContext {
  const logger = createMockLogger();
  return {
    state,
    dispatcher,
    routing: createRoutingInputs(),
    templates: DEFAULT_PROMPT_TEMPLATES,
    panelistContext: {},
    hooks: new GuardedHooks({}, logger),
    logger,
  };
}

/**
 * Builds a finished round from `[alias, content]` pairs; pass an Error to mark a failure.
 */
export function createRound(roundNumber: number, entries: ReadonlyArray<[string, string | Error]>): DebateRound {
  return {
    roundNumber,
    roundType: roundNumber === 0 ? ROUND_TYPES.INITIAL : ROUND_TYPES.REFLECTION,
    results: entries.map(([alias, outcome]) => ({
      alias,
      modelId: alias,
      roundNumber,
      role: roundNumber === 0 ? RESULT_ROLES.INITIAL : RESULT_ROLES.REFLECTION,
      content: outcome instanceof Error ? '' : outcome,
      ...(outcome instanceof Error && { error: outcome.message }),
      latencyMs: 1,
      timestamp: new Date(),
    })),
  };
}
