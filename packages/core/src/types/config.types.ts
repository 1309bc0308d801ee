import type { BackendCredentials, BackendKind, ModelCatalog, ModelCatalogEntry, RoutingMode } from './backend.types';
import type { TraceOption } from './tracing.types';

/** Default per-call timeout for backend requests. */
export const DEFAULT_TIMEOUT_MS = 120_000;

/** Largest delay a Node timer accepts; longer ones fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Default cap on concurrent in-flight calls per backend client. */
export const DEFAULT_MAX_CONCURRENCY = 8;

/**
 * Per-backend transport settings.
 */
export interface BackendSettings {
  timeoutMs?: number;
  maxConcurrency?: number;
  /** Overrides the registry's default endpoint (e.g. a proxy). */
  baseUrl?: string;
}

/**
 * Paths (relative to the config file) of prompt template overrides.
 */
export interface PromptPathsConfig {
  initialPath?: string;
  reflectionPath?: string;
  synthesisPath?: string;
  scoringPath?: string;
}

/**
 * Routing section of the config file.
 *
 * @property default - Mode used for any alias without an override.
 * @property overrides - Per-alias modes, e.g. `{ "claude": "direct" }`.
 */
export interface RoutingFileConfig {
  default?: RoutingMode;
  overrides?: Record<string, RoutingMode>;
}

export interface DebateDefaultsConfig {
  panel?: string[];
  synthesizer?: string;
  rounds?: number;
}

/**
 * Shape of `crosstalk.config.json`. Every section is optional; missing values fall
 * back to built-in defaults.
 *
 * @property providers - API keys by backend. Environment variables take precedence.
 * @property configDir - (Internal) directory of the loaded file, used to resolve prompt paths.
 */
export interface CrosstalkFileConfig {
  modelAliases?: Record<string, ModelCatalogEntry>;
  routing?: RoutingFileConfig;
  providers?: Partial<Record<BackendKind, string>>;
  defaults?: DebateDefaultsConfig;
  backends?: Partial<Record<BackendKind, BackendSettings>>;
  trace?: TraceOption;
  prompts?: PromptPathsConfig;
  configDir?: string;
}

export interface RoutingConfig {
  readonly defaultMode: RoutingMode;
  readonly overrides: Readonly<Record<string, RoutingMode>>;
}

export interface ResolvedBackendSettings {
  readonly timeoutMs: number;
  readonly maxConcurrency: number;
  readonly baseUrl?: string;
}

/**
 * Immutable configuration for one run. Built once by `createConfigSnapshot` and
 * frozen; nothing mutates it mid-run.
 */
export interface ConfigSnapshot {
  readonly catalog: ModelCatalog;
  readonly routing: RoutingConfig;
  readonly credentials: BackendCredentials;
  readonly panel: readonly string[];
  readonly synthesizer: string;
  readonly rounds: number;
  readonly backends: Readonly<Record<BackendKind, ResolvedBackendSettings>>;
  readonly trace?: TraceOption;
  readonly prompts: PromptPathsConfig;
  readonly configDir: string;
}
