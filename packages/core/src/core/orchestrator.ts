import { randomUUID } from 'crypto';

import type { Dispatcher } from '../dispatch/batch-dispatcher';
import { DEFAULT_PROMPT_TEMPLATES, PromptTemplates } from '../prompts/debate-prompts';
import { resolveModelId, RoutingInputs } from '../routing/routing-resolver';
import { RoundEngine } from '../state-machine/round-engine';
import { NODE_TYPES, NodeType } from '../state-machine/types';
import { buildTranscript } from '../transcript/transcript';
import type { ModelCatalog } from '../types/backend.types';
import {
  DebateHooks, DebateRunOptions, DebateState, DebateTranscript, ExperimentMetadata, MAX_ROUNDS, ReplayOptions, ROUND_TYPES,
} from '../types/debate.types';
import { InvalidRequestError } from '../utils/errors';
import { defaultLogger, Logger } from '../utils/logger';

export interface DebateOrchestratorOptions {
  dispatcher: Dispatcher;
  routing: RoutingInputs;
  templates?: PromptTemplates;
  hooks?: DebateHooks;
  logger?: Logger;
}

function validateParticipants(query: string, panel: readonly string[], synthesizer: string, catalog: ModelCatalog): void {
  if (query.trim().length === 0) {
    throw new InvalidRequestError('Query must not be empty');
  }
  if (panel.length === 0) {
    throw new InvalidRequestError('Panel must contain at least one model');
  }
  const seen = new Set<string>();
  for (const alias of panel) {
    if (seen.has(alias)) {
      throw new InvalidRequestError(`Panel contains '${alias}' more than once`);
    }
    seen.add(alias);
    resolveModelId(alias, catalog);
  }
  resolveModelId(synthesizer, catalog);
}

function validateExperiment(experiment: ExperimentMetadata | undefined): void {
  if (experiment === undefined) {
    return;
  }
  if (experiment.experimentId.trim().length === 0) {
    throw new InvalidRequestError('Experiment id must not be empty');
  }
  if (experiment.condition.trim().length === 0) {
    throw new InvalidRequestError('Experiment condition must not be empty');
  }
}

/**
 * Checks a debate request before anything is dispatched.
 *
 * @throws {InvalidRequestError} On an empty query, an empty or duplicated panel,
 * an unresolvable alias, or a round count outside 1..MAX_ROUNDS.
 */
export function validateDebateRequest(
  query: string,
  panel: readonly string[],
  synthesizer: string,
  maxRounds: number,
  catalog: ModelCatalog
): void {
  validateParticipants(query, panel, synthesizer, catalog);
  if (!Number.isInteger(maxRounds) || maxRounds < 1 || maxRounds > MAX_ROUNDS) {
    throw new InvalidRequestError(`Rounds must be an integer between 1 and ${MAX_ROUNDS}, got ${maxRounds}`);
  }
}

/**
 * Checks that a transcript can be replayed: its participants still resolve, it
 * holds the initial round and every reflection round it was run with, and the
 * added round count is a non-negative integer.
 *
 * @throws {InvalidRequestError} When any of these does not hold.
 */
export function validateReplayRequest(source: DebateTranscript, additionalRounds: number, synthesizer: string, catalog: ModelCatalog): void {
  if (!Number.isInteger(additionalRounds) || additionalRounds < 0) {
    throw new InvalidRequestError(`Additional rounds must be an integer >= 0, got ${additionalRounds}`);
  }
  validateParticipants(source.query, source.panel, synthesizer, catalog);
  if (source.rounds[0]?.roundType !== ROUND_TYPES.INITIAL) {
    throw new InvalidRequestError(`Transcript ${source.transcriptId} has no initial round`);
  }
  if (source.rounds.length !== source.maxRounds + 1) {
    throw new InvalidRequestError(
      `Transcript ${source.transcriptId} has ${source.rounds.length} round(s); expected ${source.maxRounds + 1}`
    );
  }
}

/**
 * Runs debates: validates the request, drives the round engine, and returns an
 * immutable transcript. Progress hooks are guarded; a failing hook is logged and
 * never stops the debate.
 */
export class DebateOrchestrator {
  private readonly templates: PromptTemplates;
  private readonly logger: Logger;

  constructor(private readonly options: DebateOrchestratorOptions) {
    this.templates = options.templates ?? DEFAULT_PROMPT_TEMPLATES;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Runs one debate: an initial round, `maxRounds` reflection rounds, then synthesis.
   *
   * @param query - The question put to the panel.
   * @param panel - Distinct aliases (or full model ids) of the panel members, in order.
   * @param synthesizer - Alias that writes the final answer. Need not be on the panel.
   * @param maxRounds - Reflection rounds, 1..3.
   * @param options - Per-run context, observer, metadata, experiment tags and transcript id.
   * @returns The deep-frozen transcript.
   * @throws {InvalidRequestError} If a precondition fails; nothing is dispatched.
   */
  async run(
    query: string,
    panel: readonly string[],
    synthesizer: string,
    maxRounds: number,
    options: DebateRunOptions = {}
  ): Promise<DebateTranscript> {
    validateDebateRequest(query, panel, synthesizer, maxRounds, this.options.routing.catalog);
    validateExperiment(options.experiment);

    const transcriptId = options.transcriptId ?? randomUUID();
    this.logger.debug(`Starting debate ${transcriptId} with ${panel.join(', ')}; synthesizer ${synthesizer}; ${maxRounds} round(s)`);

    return this.execute(
      transcriptId,
      { query, panel: [...panel], synthesizer, maxRounds, rounds: [] },
      NODE_TYPES.INITIAL,
      options,
      options.metadata ?? {}
    );
  }

  /**
   * Continues a finished debate into a new transcript. The source rounds are kept
   * as they are, `additionalRounds` reflection rounds are appended (numbered on from
   * the last source round), and synthesis runs again. The source is never changed.
   *
   * `metadata.sourceTranscriptId` links back to the source and `metadata.replayConfig`
   * records the synthesizer override (`null` when none) and the added round count.
   *
   * @throws {InvalidRequestError} If a precondition fails; nothing is dispatched.
   */
  async replay(source: DebateTranscript, options: ReplayOptions = {}): Promise<DebateTranscript> {
    const additionalRounds = options.additionalRounds ?? 0;
    const synthesizer = options.synthesizer ?? source.synthesizer;
    validateReplayRequest(source, additionalRounds, synthesizer, this.options.routing.catalog);
    validateExperiment(options.experiment);

    const transcriptId = options.transcriptId ?? randomUUID();
    this.logger.debug(`Replaying debate ${source.transcriptId} as ${transcriptId}; synthesizer ${synthesizer}; +${additionalRounds} round(s)`);

    return this.execute(
      transcriptId,
      {
        query: source.query,
        panel: [...source.panel],
        synthesizer,
        maxRounds: source.maxRounds + additionalRounds,
        rounds: [...source.rounds],
      },
      NODE_TYPES.ROUND_MANAGER,
      options,
      {
        ...options.metadata,
        sourceTranscriptId: source.transcriptId,
        replayConfig: { synthesizerOverride: options.synthesizer ?? null, additionalRounds },
      }
    );
  }

  private async execute(
    transcriptId: string,
    state: DebateState,
    startNode: NodeType,
    options: DebateRunOptions,
    metadata: Record<string, unknown>
  ): Promise<DebateTranscript> {
    const createdAt = new Date();
    const engine = new RoundEngine({
      dispatcher: this.options.dispatcher,
      routing: this.options.routing,
      templates: this.templates,
      logger: this.logger,
      ...(options.panelistContext !== undefined && { panelistContext: options.panelistContext }),
      ...(this.options.hooks !== undefined && { hooks: this.options.hooks }),
      ...(options.onRoundComplete !== undefined && { onRoundComplete: options.onRoundComplete }),
    });

    const finalState = await engine.run(state, startNode);
    return buildTranscript(transcriptId, finalState, createdAt, metadata, options.experiment);
  }
}
