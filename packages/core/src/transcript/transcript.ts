import type { CompletionUsage, RoundResult, RoutingDecision } from '../types/backend.types';
import {
  DEFAULT_EXPERIMENT_SOURCE_TOOL, DebateRound, DebateState, DebateTranscript, ExperimentMetadata, TranscriptMetadata,
} from '../types/debate.types';
import { deepFreeze } from '../utils/common';

/** Version of the serialized transcript shape. Bump on any incompatible change. */
export const TRANSCRIPT_SCHEMA_VERSION = 1;

function experimentRecord(experiment: ExperimentMetadata): Record<string, unknown> {
  return {
    experimentId: experiment.experimentId,
    sourceTool: experiment.sourceTool ?? DEFAULT_EXPERIMENT_SOURCE_TOOL,
    ...(experiment.campaignId !== undefined && { campaignId: experiment.campaignId }),
    condition: experiment.condition,
    variables: experiment.variables,
    ...(experiment.findingRef !== undefined && { findingRef: experiment.findingRef }),
  };
}

/**
 * Builds the immutable transcript for a finished debate. Metadata is copied,
 * so later changes to the caller's object do not leak in. Experiment tags go
 * under `metadata.experiment`.
 */
export function buildTranscript(
  transcriptId: string,
  state: DebateState,
  createdAt: Date,
  metadata: Record<string, unknown> = {},
  experiment?: ExperimentMetadata
): DebateTranscript {
  const merged = experiment === undefined ? metadata : { ...metadata, experiment: experimentRecord(experiment) };
  return deepFreeze({
    transcriptId,
    query: state.query,
    panel: [...state.panel],
    synthesizer: state.synthesizer,
    maxRounds: state.maxRounds,
    rounds: state.rounds.map((round) => ({ ...round, results: [...round.results] })),
    ...(state.synthesis !== undefined && { synthesis: state.synthesis }),
    createdAt,
    metadata: structuredClone(merged),
  });
}

/**
 * Returns a new frozen transcript whose metadata is the old metadata with
 * `patch` merged over it (top-level keys). The original is unchanged.
 */
export function withMetadata(transcript: DebateTranscript, patch: Record<string, unknown>): DebateTranscript {
  const metadata: TranscriptMetadata = { ...structuredClone(transcript.metadata), ...structuredClone(patch) };
  return deepFreeze({ ...transcript, metadata });
}

export interface SerializedRoutingDecision {
  backend: string;
  vendor: string;
  mode: string;
  viaAggregator: boolean;
  viaFallback: boolean;
}

export interface SerializedRoundResult {
  alias: string;
  modelId: string;
  roundNumber: number;
  role: string;
  content: string;
  error: string | null;
  usage: CompletionUsage | null;
  latencyMs: number;
  timestamp: string;
  routing: SerializedRoutingDecision | null;
}

export interface SerializedRound {
  roundNumber: number;
  roundType: string;
  results: SerializedRoundResult[];
}

/**
 * Versioned JSON shape of a transcript. Timestamps are ISO-8601 UTC strings.
 */
export interface SerializedTranscript {
  schemaVersion: typeof TRANSCRIPT_SCHEMA_VERSION;
  transcriptId: string;
  query: string;
  panel: string[];
  synthesizer: string;
  maxRounds: number;
  createdAt: string;
  rounds: SerializedRound[];
  synthesis: SerializedRoundResult | null;
  metadata: Record<string, unknown>;
}

function serializeRouting(routing: RoutingDecision): SerializedRoutingDecision {
  return {
    backend: routing.backend,
    vendor: routing.vendor,
    mode: routing.mode,
    viaAggregator: routing.viaAggregator,
    viaFallback: routing.viaFallback,
  };
}

export function serializeResult(result: RoundResult): SerializedRoundResult {
  return {
    alias: result.alias,
    modelId: result.modelId,
    roundNumber: result.roundNumber,
    role: result.role,
    content: result.content,
    error: result.error ?? null,
    usage: result.usage ? { ...result.usage } : null,
    latencyMs: result.latencyMs,
    timestamp: result.timestamp.toISOString(),
    routing: result.routing ? serializeRouting(result.routing) : null,
  };
}

function serializeRound(round: DebateRound): SerializedRound {
  return {
    roundNumber: round.roundNumber,
    roundType: round.roundType,
    results: round.results.map(serializeResult),
  };
}

/**
 * Converts a transcript to its versioned JSON-compatible shape.
 */
export function serializeTranscript(transcript: DebateTranscript): SerializedTranscript {
  return {
    schemaVersion: TRANSCRIPT_SCHEMA_VERSION,
    transcriptId: transcript.transcriptId,
    query: transcript.query,
    panel: [...transcript.panel],
    synthesizer: transcript.synthesizer,
    maxRounds: transcript.maxRounds,
    createdAt: transcript.createdAt.toISOString(),
    rounds: transcript.rounds.map(serializeRound),
    synthesis: transcript.synthesis ? serializeResult(transcript.synthesis) : null,
    metadata: { ...structuredClone(transcript.metadata) },
  };
}
