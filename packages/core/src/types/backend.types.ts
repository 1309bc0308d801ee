/**
 * Backend kinds the router can dispatch to. The set is closed: adding a backend
 * means adding an entry to the backend registry table.
 */
export const BACKEND_KINDS = {
  ANTHROPIC: 'anthropic',
  OPENAI: 'openai',
  GOOGLE: 'google',
  XAI: 'xai',
  GROQ: 'groq',
  OPENROUTER: 'openrouter',
} as const;

export type BackendKind = (typeof BACKEND_KINDS)[keyof typeof BACKEND_KINDS];

/** The aggregator backend that fronts every vendor. */
export const AGGREGATOR_BACKEND: BackendKind = BACKEND_KINDS.OPENROUTER;

/**
 * How an alias is routed.
 * - `auto`: native backend when credentialed, aggregator otherwise.
 * - `direct`: native backend only; a missing credential is an error.
 * - `openrouter`: always through the aggregator.
 */
export const ROUTING_MODES = {
  AUTO: 'auto',
  DIRECT: 'direct',
  OPENROUTER: 'openrouter',
} as const;

export type RoutingMode = (typeof ROUTING_MODES)[keyof typeof ROUTING_MODES];

export function isBackendKind(value: unknown): value is BackendKind {
  return typeof value === 'string' && Object.values<string>(BACKEND_KINDS).includes(value);
}

export function isRoutingMode(value: unknown): value is RoutingMode {
  return typeof value === 'string' && Object.values<string>(ROUTING_MODES).includes(value);
}

/**
 * Model ids for one alias. `openrouter` is the aggregator id (vendor-prefixed,
 * e.g. "anthropic/claude-sonnet-4.5"); `direct` is the vendor's own id when it differs.
 */
export interface ModelCatalogEntry {
  openrouter: string;
  direct?: string;
}

export type ModelCatalog = Readonly<Record<string, ModelCatalogEntry>>;

/**
 * Where one alias's calls go. Frozen on creation.
 */
export interface RoutingDecision {
  readonly backend: BackendKind;
  /** The alias's native backend, derived from its aggregator id prefix. */
  readonly vendor: BackendKind;
  readonly mode: RoutingMode;
  /** True when `backend` is the aggregator. */
  readonly viaAggregator: boolean;
  /** True only when `auto` chose the aggregator because the native credential was missing. */
  readonly viaFallback: boolean;
}

/**
 * Credentials available for this run, keyed by backend. A backend is considered
 * credentialed when its entry is a non-empty string.
 */
export type BackendCredentials = Readonly<Partial<Record<BackendKind, string>>>;

export interface PanelMember {
  readonly alias: string;
  readonly modelId: string;
  readonly routing: RoutingDecision;
}

/**
 * Chat message roles understood by every backend.
 */
export const CHAT_ROLES = {
  SYSTEM: 'system',
  USER: 'user',
  ASSISTANT: 'assistant',
} as const;

export type ChatRole = (typeof CHAT_ROLES)[keyof typeof CHAT_ROLES];

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/**
 * Role a result plays in a debate.
 */
export const RESULT_ROLES = {
  INITIAL: 'initial',
  REFLECTION: 'reflection',
  SYNTHESIS: 'synthesis',
  SCORING: 'scoring',
} as const;

export type ResultRole = (typeof RESULT_ROLES)[keyof typeof RESULT_ROLES];

export const INITIAL_ROUND = 0;
export const SYNTHESIS_ROUND = -1;
export const SCORING_ROUND = -2;

/**
 * One call's request. Exactly one of `messages` or `prompt` must be given.
 */
export interface BackendRequest {
  alias: string;
  modelId: string;
  roundNumber: number;
  role: ResultRole;
  messages?: ChatMessage[];
  prompt?: string;
}

/**
 * A request paired with the routing decision that picked its backend.
 */
export interface RoutedRequest extends BackendRequest {
  routing: RoutingDecision;
}

/**
 * Normalized outcome of one backend call. `error` set implies `content === ''`.
 */
export interface RoundResult {
  readonly alias: string;
  readonly modelId: string;
  readonly roundNumber: number;
  readonly role: ResultRole;
  readonly content: string;
  readonly error?: string;
  readonly usage?: CompletionUsage;
  readonly latencyMs: number;
  readonly timestamp: Date;
  readonly routing?: RoutingDecision;
}
