import { randomUUID } from 'crypto';

import { BackendClient, BackendClientOptions } from '../backends/backend-client';
import { createBackendClient } from '../backends/backend-registry';
import { BatchDispatcher } from '../dispatch/batch-dispatcher';
import { resolvePanelMember, RoutingInputs } from '../routing/routing-resolver';
import { scoreSynthesis } from '../scoring/ground-truth-scorer';
import { withMetadata } from '../transcript/transcript';
import type { BackendKind, RoutingDecision } from '../types/backend.types';
import type { ConfigSnapshot } from '../types/config.types';
import type { DebateHooks, DebateRunOptions, DebateTranscript } from '../types/debate.types';
import { defaultLogger, Logger } from '../utils/logger';
import { resolvePromptTemplates } from '../utils/prompt-loader';
import { createTracingClient, createTracingContext, flushTracing } from '../utils/tracing-factory';

import { DebateOrchestrator, validateDebateRequest } from './orchestrator';

export type BackendClientFactory = (kind: BackendKind, options: BackendClientOptions) => BackendClient;

export interface RunDebateOptions extends DebateRunOptions {
  /** Defaults to the config's panel. */
  panel?: readonly string[];
  /** Defaults to the config's synthesizer. */
  synthesizer?: string;
  /** Defaults to the config's round count. */
  rounds?: number;
  hooks?: DebateHooks;
  logger?: Logger;
  /** Reference answer; when given, the synthesis is scored and the score stored under `metadata.groundTruthScore`. */
  groundTruth?: string;
  /** Name of the config file, recorded in trace metadata. */
  configFileName?: string;
  createClient?: BackendClientFactory;
}

/**
 * Backends the debate will call, from the routing of every panel alias and the
 * synthesizer. Aliases whose routing fails are skipped; the engine reports them.
 * Each `auto` fallback onto the aggregator is warned about once.
 */
function backendsInUse(aliases: readonly string[], routing: RoutingInputs, logger: Logger): Set<BackendKind> {
  const backends = new Set<BackendKind>();
  for (const alias of new Set(aliases)) {
    let decision: RoutingDecision;
    try {
      decision = resolvePanelMember(alias, routing).routing;
    } catch (_err) {
      continue;
    }
    if (decision.viaFallback) {
      logger.warn(`[${alias}] no ${decision.vendor} API key configured; routing through ${decision.backend}`);
    }
    backends.add(decision.backend);
  }
  return backends;
}

function createClients(
  backends: Iterable<BackendKind>,
  config: ConfigSnapshot,
  createClient: BackendClientFactory,
  logger: Logger
): BackendClient[] {
  const clients: BackendClient[] = [];
  for (const kind of backends) {
    const apiKey = config.credentials[kind];
    if (apiKey === undefined) {
      logger.warn(`No API key configured for ${kind}; its calls will fail`);
      continue;
    }
    const settings = config.backends[kind];
    clients.push(createClient(kind, {
      apiKey,
      timeoutMs: settings.timeoutMs,
      maxConcurrency: settings.maxConcurrency,
      ...(settings.baseUrl !== undefined && { baseUrl: settings.baseUrl }),
      logger,
    }));
  }
  return clients;
}

/**
 * Runs one debate from a configuration snapshot: applies config defaults, opens
 * a client for every backend the debate routes to, runs the orchestrator, and
 * closes the clients again whatever the outcome, a failed open included.
 *
 * @throws {InvalidRequestError} If a precondition fails; no client is opened.
 * @throws {BackendConfigError} If a backend client cannot be constructed.
 */
export async function runDebate(query: string, config: ConfigSnapshot, options: RunDebateOptions = {}): Promise<DebateTranscript> {
  const logger = options.logger ?? defaultLogger;
  const panel = options.panel ?? config.panel;
  const synthesizer = options.synthesizer ?? config.synthesizer;
  const rounds = options.rounds ?? config.rounds;
  validateDebateRequest(query, panel, synthesizer, rounds, config.catalog);

  const routing: RoutingInputs = {
    catalog: config.catalog,
    routing: config.routing,
    credentials: config.credentials,
  };
  const transcriptId = options.transcriptId ?? randomUUID();
  const tracingContext = createTracingContext(
    config.trace,
    {
      transcriptId,
      query,
      panel: [...panel],
      synthesizer,
      rounds,
      ...(options.configFileName !== undefined && { configFileName: options.configFileName }),
    },
    `debate-${transcriptId}`
  );

  const clients = createClients(
    backendsInUse([...panel, synthesizer], routing, logger),
    config,
    options.createClient ?? createBackendClient,
    logger
  ).map((client) => createTracingClient(client, tracingContext));

  try {
    await Promise.all(clients.map((client) => client.open()));
    const dispatcher = new BatchDispatcher(clients, logger);
    const templates = resolvePromptTemplates(config.prompts, config.configDir);
    const orchestrator = new DebateOrchestrator({
      dispatcher,
      routing,
      templates,
      logger,
      ...(options.hooks !== undefined && { hooks: options.hooks }),
    });

    const transcript = await orchestrator.run(query, panel, synthesizer, rounds, {
      transcriptId,
      ...(options.panelistContext !== undefined && { panelistContext: options.panelistContext }),
      ...(options.onRoundComplete !== undefined && { onRoundComplete: options.onRoundComplete }),
      ...(options.metadata !== undefined && { metadata: options.metadata }),
      ...(options.experiment !== undefined && { experiment: options.experiment }),
    });

    const synthesis = transcript.synthesis;
    if (options.groundTruth === undefined) {
      return transcript;
    }
    if (synthesis === undefined || synthesis.error !== undefined) {
      logger.warn('Skipping ground-truth scoring: synthesis failed');
      return transcript;
    }
    const score = await scoreSynthesis({
      dispatcher,
      routing,
      query,
      synthesisContent: synthesis.content,
      groundTruth: options.groundTruth,
      judgeAlias: synthesizer,
      template: templates.scoring,
    });
    return withMetadata(transcript, { groundTruthScore: score });
  } finally {
    await Promise.all(clients.map((client) => client.close()));
    await flushTracing(tracingContext);
  }
}
