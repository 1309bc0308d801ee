// Core classes
export { DebateOrchestrator, validateDebateRequest, validateReplayRequest } from './core/orchestrator';
export type { DebateOrchestratorOptions } from './core/orchestrator';
export { runDebate } from './core/run-debate';
export type { RunDebateOptions, BackendClientFactory } from './core/run-debate';
export { RoundEngine } from './state-machine/round-engine';
export type { RoundEngineOptions } from './state-machine/round-engine';
export { DEBATE_EVENTS, createEvent } from './state-machine/events';
export type { DebateEvent, DebateEventType } from './state-machine/events';
export { NODE_TYPES } from './state-machine/types';
export type { NodeType, DebateNode, NodeContext } from './state-machine/types';
export type { NodeResult } from './state-machine/node';
export { TransitionGraph, DEFAULT_TRANSITIONS } from './state-machine/graph';
export type { TransitionRule } from './state-machine/graph';
export { GuardedHooks } from './state-machine/guarded-hooks';

// Routing and dispatch
export {
  resolveRoute, resolveRoutingMode, resolvePanelMember, resolveModelId, nativeBackendFor, modelIdForRoute,
} from './routing/routing-resolver';
export type { RoutingInputs } from './routing/routing-resolver';
export { BatchDispatcher } from './dispatch/batch-dispatcher';
export type { Dispatcher } from './dispatch/batch-dispatcher';

// Backends
export { BaseBackendClient, validateRequest, erroredResult } from './backends/backend-client';
export type { BackendClient, BackendClientOptions, CompletionResponse } from './backends/backend-client';
export { OpenAICompatibleClient } from './backends/openai-compatible-client';
export { AnthropicClient, ANTHROPIC_DEFAULT_MAX_TOKENS } from './backends/anthropic-client';
export { BACKEND_REGISTRY, createBackendClient } from './backends/backend-registry';
export type { BackendDefinition } from './backends/backend-registry';

// Prompts, scoring, transcripts
export * from './prompts/debate-prompts';
export { scoreSynthesis, parseScoreResponse, UNSCORED } from './scoring/ground-truth-scorer';
export type { ScoreSynthesisParams } from './scoring/ground-truth-scorer';
export { buildTranscript, serializeTranscript, withMetadata, TRANSCRIPT_SCHEMA_VERSION } from './transcript/transcript';
export type { SerializedTranscript, SerializedRound, SerializedRoundResult } from './transcript/transcript';

// Configuration
export { createConfigSnapshot, resolveCredentials } from './config/config-snapshot';
export { parseConfigFile } from './config/config-parser';
export type { EnvSource } from './config/config-snapshot';
export * from './config/defaults';

// Types - re-export all
export * from './types/backend.types';
export * from './types/debate.types';
export * from './types/config.types';
export * from './types/tracing.types';

// Utilities
export { resolvePrompt, resolvePromptTemplates, PROMPT_SOURCES } from './utils/prompt-loader';
export type { PromptResolveResult } from './utils/prompt-loader';
export { loadEnvironmentFile } from './utils/env-loader';
export type { EnvFileReport } from './utils/env-loader';
export { createValidationError, writeFileWithDirectories, getOwn, readJsonFile, isRecord, deepFreeze } from './utils/common';
export { settleWithConcurrencyLimit } from './utils/promise';
export {
  DebateError, InvalidRequestError, RoutingUnavailableError, BackendConfigError, BackendCallError,
  ObserverError, BACKEND_CALL_ERROR_KINDS, getErrorMessage,
} from './utils/errors';
export type { BackendCallErrorKind } from './utils/errors';
export { EXIT_SUCCESS, EXIT_GENERAL_ERROR, EXIT_INVALID_ARGS, EXIT_CONFIG_ERROR, EXIT_PROVIDER_ERROR } from './utils/exit-codes';
export type { ErrorWithCode } from './utils/exit-codes';
export { logInfo, logSuccess, logWarning, logError, writeStderr, MessageType, MESSAGE_ICONS } from './utils/console';
export { Logger, defaultLogger } from './utils/logger';

// Tracing utilities
export { validateLangfuseConfig, createTracingContext, createTracingClient, flushTracing } from './utils/tracing-factory';
export { TracingBackendClient } from './utils/tracing-backend-client';
