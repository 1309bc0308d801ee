import { BackendKind, isBackendKind, isRoutingMode, ModelCatalogEntry, RoutingMode } from '../types/backend.types';
import {
  BackendSettings, CrosstalkFileConfig, DebateDefaultsConfig, MAX_TIMEOUT_MS, PromptPathsConfig, RoutingFileConfig,
} from '../types/config.types';
import { TRACE_OPTIONS } from '../types/tracing.types';
import { createValidationError, isRecord } from '../utils/common';
import { EXIT_CONFIG_ERROR } from '../utils/exit-codes';

function configError(message: string): Error {
  return createValidationError(`Invalid config: ${message}`, EXIT_CONFIG_ERROR);
}

function optionalString(section: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw configError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalPositiveInt(section: Record<string, unknown>, key: string, where: string, max?: number): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw configError(`${where}.${key} must be a positive integer`);
  }
  if (max !== undefined && value > max) {
    throw configError(`${where}.${key} must be at most ${max}`);
  }
  return value;
}

function requireSection(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw configError(`${where} must be an object`);
  }
  return value;
}

function parseModelAliases(value: unknown): Record<string, ModelCatalogEntry> {
  const aliases: Record<string, ModelCatalogEntry> = {};
  for (const [alias, raw] of Object.entries(requireSection(value, 'modelAliases'))) {
    // A bare string is shorthand for an aggregator id with no direct id.
    if (typeof raw === 'string') {
      aliases[alias] = { openrouter: raw };
      continue;
    }
    const entry = requireSection(raw, `modelAliases.${alias}`);
    const openrouter = optionalString(entry, 'openrouter', `modelAliases.${alias}`);
    if (openrouter === undefined) {
      throw configError(`modelAliases.${alias}.openrouter is required`);
    }
    const direct = optionalString(entry, 'direct', `modelAliases.${alias}`);
    aliases[alias] = { openrouter, ...(direct !== undefined && { direct }) };
  }
  return aliases;
}

function parseRoutingMode(value: unknown, where: string): RoutingMode {
  if (!isRoutingMode(value)) {
    throw configError(`${where} must be one of auto, direct, openrouter`);
  }
  return value;
}

function parseRouting(value: unknown): RoutingFileConfig {
  const section = requireSection(value, 'routing');
  const routing: RoutingFileConfig = {};
  if (section.default !== undefined) {
    routing.default = parseRoutingMode(section.default, 'routing.default');
  }
  if (section.overrides !== undefined) {
    const overrides: Record<string, RoutingMode> = {};
    for (const [alias, mode] of Object.entries(requireSection(section.overrides, 'routing.overrides'))) {
      overrides[alias] = parseRoutingMode(mode, `routing.overrides.${alias}`);
    }
    routing.overrides = overrides;
  }
  return routing;
}

function parseBackendKeyed<T>(value: unknown, where: string, parseEntry: (raw: unknown, where: string) => T): Partial<Record<BackendKind, T>> {
  const result: Partial<Record<BackendKind, T>> = {};
  for (const [name, raw] of Object.entries(requireSection(value, where))) {
    if (!isBackendKind(name)) {
      throw configError(`${where}.${name} is not a known backend`);
    }
    result[name] = parseEntry(raw, `${where}.${name}`);
  }
  return result;
}

function parseApiKey(raw: unknown, where: string): string {
  if (typeof raw !== 'string') {
    throw configError(`${where} must be a string`);
  }
  return raw;
}

function parseBackendSettings(raw: unknown, where: string): BackendSettings {
  const entry = requireSection(raw, where);
  const timeoutMs = optionalPositiveInt(entry, 'timeoutMs', where, MAX_TIMEOUT_MS);
  const maxConcurrency = optionalPositiveInt(entry, 'maxConcurrency', where);
  const baseUrl = optionalString(entry, 'baseUrl', where);
  return {
    ...(timeoutMs !== undefined && { timeoutMs }),
    ...(maxConcurrency !== undefined && { maxConcurrency }),
    ...(baseUrl !== undefined && { baseUrl }),
  };
}

function parseDefaults(value: unknown): DebateDefaultsConfig {
  const section = requireSection(value, 'defaults');
  const defaults: DebateDefaultsConfig = {};
  if (section.panel !== undefined) {
    if (!Array.isArray(section.panel) || !section.panel.every((alias: unknown) => typeof alias === 'string')) {
      throw configError('defaults.panel must be an array of strings');
    }
    defaults.panel = section.panel.filter((alias: unknown): alias is string => typeof alias === 'string');
  }
  const synthesizer = optionalString(section, 'synthesizer', 'defaults');
  if (synthesizer !== undefined) defaults.synthesizer = synthesizer;
  const rounds = optionalPositiveInt(section, 'rounds', 'defaults');
  if (rounds !== undefined) defaults.rounds = rounds;
  return defaults;
}

function parsePrompts(value: unknown): PromptPathsConfig {
  const section = requireSection(value, 'prompts');
  const prompts: PromptPathsConfig = {};
  const initialPath = optionalString(section, 'initialPath', 'prompts');
  const reflectionPath = optionalString(section, 'reflectionPath', 'prompts');
  const synthesisPath = optionalString(section, 'synthesisPath', 'prompts');
  const scoringPath = optionalString(section, 'scoringPath', 'prompts');
  if (initialPath !== undefined) prompts.initialPath = initialPath;
  if (reflectionPath !== undefined) prompts.reflectionPath = reflectionPath;
  if (synthesisPath !== undefined) prompts.synthesisPath = synthesisPath;
  if (scoringPath !== undefined) prompts.scoringPath = scoringPath;
  return prompts;
}

/**
 * Validates the parsed JSON of a config file and returns it typed. Unknown
 * top-level keys are ignored.
 *
 * @param raw - Parsed JSON.
 * @param configDir - Directory of the file, used later to resolve prompt paths.
 * @throws {ErrorWithCode} EXIT_CONFIG_ERROR on any malformed section.
 */
export function parseConfigFile(raw: unknown, configDir: string): CrosstalkFileConfig {
  const root = requireSection(raw, 'config root');
  const config: CrosstalkFileConfig = { configDir };

  if (root.modelAliases !== undefined) config.modelAliases = parseModelAliases(root.modelAliases);
  if (root.routing !== undefined) config.routing = parseRouting(root.routing);
  if (root.providers !== undefined) config.providers = parseBackendKeyed(root.providers, 'providers', parseApiKey);
  if (root.backends !== undefined) config.backends = parseBackendKeyed(root.backends, 'backends', parseBackendSettings);
  if (root.defaults !== undefined) config.defaults = parseDefaults(root.defaults);
  if (root.prompts !== undefined) config.prompts = parsePrompts(root.prompts);
  if (root.trace !== undefined) {
    if (root.trace !== TRACE_OPTIONS.LANGFUSE) {
      throw configError(`trace must be '${TRACE_OPTIONS.LANGFUSE}'`);
    }
    config.trace = TRACE_OPTIONS.LANGFUSE;
  }
  return config;
}
