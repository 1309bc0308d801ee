import path from 'path';

import { BACKEND_REGISTRY } from '../backends/backend-registry';
import {
  BACKEND_KINDS, BackendCredentials, BackendKind, isBackendKind, isRoutingMode,
  ModelCatalog, ModelCatalogEntry, RoutingMode,
} from '../types/backend.types';
import {
  BackendSettings, ConfigSnapshot, CrosstalkFileConfig, DEFAULT_MAX_CONCURRENCY, DEFAULT_TIMEOUT_MS,
  ResolvedBackendSettings, RoutingConfig,
} from '../types/config.types';
import { DEFAULT_ROUNDS, MAX_ROUNDS } from '../types/debate.types';
import { logWarning } from '../utils/console';
import { InvalidRequestError } from '../utils/errors';

import { DEFAULT_MODEL_CATALOG, DEFAULT_PANEL, DEFAULT_ROUTING_MODE, DEFAULT_SYNTHESIZER } from './defaults';

/**
 * Environment lookup used for credentials. Defaults to `process.env`.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function buildCatalog(overrides: Record<string, ModelCatalogEntry> | undefined): ModelCatalog {
  const catalog: Record<string, ModelCatalogEntry> = { ...DEFAULT_MODEL_CATALOG };
  for (const [alias, entry] of Object.entries(overrides ?? {})) {
    if (typeof entry.openrouter !== 'string' || entry.openrouter.trim() === '') {
      throw new InvalidRequestError(`Model alias '${alias}' must define an 'openrouter' model id`);
    }
    catalog[alias] = Object.freeze({
      openrouter: entry.openrouter,
      ...(entry.direct !== undefined && { direct: entry.direct }),
    });
  }
  return Object.freeze(catalog);
}

function buildRouting(config: CrosstalkFileConfig['routing']): RoutingConfig {
  const defaultMode = config?.default ?? DEFAULT_ROUTING_MODE;
  if (!isRoutingMode(defaultMode)) {
    throw new InvalidRequestError(`Invalid default routing mode: ${String(defaultMode)}`);
  }
  const overrides: Record<string, RoutingMode> = {};
  for (const [alias, mode] of Object.entries(config?.overrides ?? {})) {
    if (!isRoutingMode(mode)) {
      throw new InvalidRequestError(`Invalid routing mode for '${alias}': ${String(mode)}`);
    }
    overrides[alias] = mode;
  }
  return Object.freeze({ defaultMode, overrides: Object.freeze(overrides) });
}

/**
 * Collects API keys: environment variables first, then the config file's `providers` section.
 */
export function resolveCredentials(providers: CrosstalkFileConfig['providers'], env: EnvSource): BackendCredentials {
  const credentials: Partial<Record<BackendKind, string>> = {};
  for (const kind of Object.values(BACKEND_KINDS)) {
    const fromEnv = env[BACKEND_REGISTRY[kind].credentialEnv];
    const fromFile = providers?.[kind];
    const key = fromEnv && fromEnv.length > 0 ? fromEnv : fromFile;
    if (key !== undefined && key.length > 0) {
      credentials[kind] = key;
    }
  }
  for (const name of Object.keys(providers ?? {})) {
    if (!isBackendKind(name)) {
      logWarning(`Ignoring credentials for unknown backend '${name}'`);
    }
  }
  return Object.freeze(credentials);
}

function settingsFor(entry: BackendSettings | undefined): ResolvedBackendSettings {
  return Object.freeze({
    timeoutMs: entry?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxConcurrency: entry?.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY,
    ...(entry?.baseUrl !== undefined && { baseUrl: entry.baseUrl }),
  });
}

function buildBackendSettings(config: CrosstalkFileConfig['backends']): Record<BackendKind, ResolvedBackendSettings> {
  return {
    anthropic: settingsFor(config?.anthropic),
    openai: settingsFor(config?.openai),
    google: settingsFor(config?.google),
    xai: settingsFor(config?.xai),
    groq: settingsFor(config?.groq),
    openrouter: settingsFor(config?.openrouter),
  };
}

function clampRounds(rounds: number | undefined): number {
  if (rounds === undefined) {
    return DEFAULT_ROUNDS;
  }
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw new InvalidRequestError(`defaults.rounds must be a positive integer, got ${rounds}`);
  }
  if (rounds > MAX_ROUNDS) {
    logWarning(`defaults.rounds ${rounds} exceeds the maximum of ${MAX_ROUNDS}; using ${MAX_ROUNDS}`);
    return MAX_ROUNDS;
  }
  return rounds;
}

/**
 * Builds the immutable configuration snapshot for a run from the parsed config
 * file (possibly empty) and the environment. The snapshot and everything in it
 * is frozen.
 *
 * @throws {InvalidRequestError} For malformed aliases, routing modes or round counts.
 */
export function createConfigSnapshot(fileConfig: CrosstalkFileConfig = {}, env: EnvSource = process.env): ConfigSnapshot {
  const defaults = fileConfig.defaults ?? {};
  return Object.freeze({
    catalog: buildCatalog(fileConfig.modelAliases),
    routing: buildRouting(fileConfig.routing),
    credentials: resolveCredentials(fileConfig.providers, env),
    panel: Object.freeze([...(defaults.panel ?? DEFAULT_PANEL)]),
    synthesizer: defaults.synthesizer ?? DEFAULT_SYNTHESIZER,
    rounds: clampRounds(defaults.rounds),
    backends: Object.freeze(buildBackendSettings(fileConfig.backends)),
    ...(fileConfig.trace !== undefined && { trace: fileConfig.trace }),
    prompts: Object.freeze({ ...(fileConfig.prompts ?? {}) }),
    configDir: fileConfig.configDir ?? path.resolve(process.cwd()),
  });
}
