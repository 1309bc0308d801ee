import type { RoundResult } from './backend.types';

/** Hard ceiling on reflection rounds. */
export const MAX_ROUNDS = 3;
export const DEFAULT_ROUNDS = 1;

export const ROUND_TYPES = {
  INITIAL: 'initial',
  REFLECTION: 'reflection',
  SYNTHESIS: 'synthesis',
} as const;

export type RoundType = (typeof ROUND_TYPES)[keyof typeof ROUND_TYPES];

export interface DebateRound {
  readonly roundNumber: number;
  readonly roundType: RoundType;
  /** In request submission order (panel order). */
  readonly results: readonly RoundResult[];
}

/**
 * Arbitrary JSON-compatible metadata attached to a transcript by collaborators
 * (experiment tags, scores, cost figures).
 */
export type TranscriptMetadata = Readonly<Record<string, unknown>>;

export interface DebateTranscript {
  readonly transcriptId: string;
  readonly query: string;
  /** Panel aliases in the order they were given. */
  readonly panel: readonly string[];
  readonly synthesizer: string;
  readonly maxRounds: number;
  /** Initial round plus up to `maxRounds` reflection rounds. */
  readonly rounds: readonly DebateRound[];
  readonly synthesis?: RoundResult;
  readonly createdAt: Date;
  readonly metadata: TranscriptMetadata;
}

/** `sourceTool` recorded when the caller names none. */
export const DEFAULT_EXPERIMENT_SOURCE_TOOL = 'manual';

/**
 * Experiment tags stored under `metadata.experiment` by research tooling.
 */
export interface ExperimentMetadata {
  experimentId: string;
  /** Defaults to `manual`. */
  sourceTool?: string;
  campaignId?: string;
  condition: string;
  variables: Record<string, unknown>;
  findingRef?: string;
}

export interface GroundTruthScore {
  /** 1-5, or -1 when the judge output could not be parsed. */
  accuracy: number;
  completeness: number;
  /** Mean of accuracy and completeness, or -1. */
  overall: number;
  explanation: string;
  judgeModel: string;
}

/**
 * Round observer. May be sync or async; failures are logged and never abort the debate.
 */
export type RoundObserver = (round: DebateRound) => void | Promise<void>;

/**
 * Lifecycle hooks for progress reporting.
 */
export interface DebateHooks {
  onRoundStart?: (roundNumber: number, roundType: RoundType, totalRounds: number) => void | Promise<void>;
  onRoundComplete?: RoundObserver;
  onSynthesisStart?: (synthesizer: string) => void | Promise<void>;
  onSynthesisComplete?: (result: RoundResult) => void | Promise<void>;
}

export interface DebateRunOptions {
  /** Per-alias text prepended to every prompt sent to that alias. */
  panelistContext?: Readonly<Record<string, string>>;
  /** Per-run observer, called after the per-orchestrator `onRoundComplete` hook. */
  onRoundComplete?: RoundObserver;
  metadata?: Record<string, unknown>;
  /** Stored under `metadata.experiment`, replacing any `experiment` key in `metadata`. */
  experiment?: ExperimentMetadata;
  transcriptId?: string;
}

export interface ReplayOptions extends DebateRunOptions {
  /** Reflection rounds to add after the source's last round. Defaults to 0 (re-synthesis only). */
  additionalRounds?: number;
  /** Synthesizer override; defaults to the source transcript's synthesizer. */
  synthesizer?: string;
}

/**
 * Engine-owned debate state. Nodes never mutate it; they return an updated copy.
 */
export interface DebateState {
  readonly query: string;
  readonly panel: readonly string[];
  readonly synthesizer: string;
  readonly maxRounds: number;
  readonly rounds: readonly DebateRound[];
  readonly synthesis?: RoundResult;
}
