import {
  AGGREGATOR_BACKEND, BACKEND_KINDS, BackendCredentials, BackendKind, ModelCatalog,
  PanelMember, RoutingDecision, RoutingMode, ROUTING_MODES,
} from '../types/backend.types';
import type { RoutingConfig } from '../types/config.types';
import { getOwn } from '../utils/common';
import { InvalidRequestError, RoutingUnavailableError } from '../utils/errors';

/**
 * Aggregator id prefix to native backend. Any other prefix is served by the aggregator itself.
 */
const VENDOR_PREFIXES: Readonly<Record<string, BackendKind>> = {
  anthropic: BACKEND_KINDS.ANTHROPIC,
  openai: BACKEND_KINDS.OPENAI,
  google: BACKEND_KINDS.GOOGLE,
  'x-ai': BACKEND_KINDS.XAI,
  groq: BACKEND_KINDS.GROQ,
};

const MODEL_ID_SEPARATOR = '/';

/**
 * Resolves an alias or full model id to its aggregator model id.
 *
 * @param aliasOrId - A catalog alias ("claude") or a vendor-prefixed id ("anthropic/claude-sonnet-4.5").
 * @throws {InvalidRequestError} If the value is neither a known alias nor contains a `/`.
 */
export function resolveModelId(aliasOrId: string, catalog: ModelCatalog): string {
  const entry = getOwn(catalog, aliasOrId);
  if (entry) {
    return entry.openrouter;
  }
  if (aliasOrId.includes(MODEL_ID_SEPARATOR)) {
    return aliasOrId;
  }
  const known = Object.keys(catalog).sort().join(', ');
  throw new InvalidRequestError(
    `Unknown model alias '${aliasOrId}'. Known aliases: ${known}. Or pass a full model id (e.g. 'anthropic/claude-sonnet-4.5').`
  );
}

/**
 * Derives the native backend of an aggregator model id from its vendor prefix.
 */
export function nativeBackendFor(aggregatorModelId: string): BackendKind {
  const separatorIndex = aggregatorModelId.indexOf(MODEL_ID_SEPARATOR);
  if (separatorIndex <= 0) {
    return AGGREGATOR_BACKEND;
  }
  return getOwn(VENDOR_PREFIXES, aggregatorModelId.slice(0, separatorIndex)) ?? AGGREGATOR_BACKEND;
}

function hasCredential(credentials: BackendCredentials, backend: BackendKind): boolean {
  const key = credentials[backend];
  return typeof key === 'string' && key.length > 0;
}

function decision(backend: BackendKind, vendor: BackendKind, mode: RoutingMode, viaFallback: boolean): RoutingDecision {
  return Object.freeze({
    backend,
    vendor,
    mode,
    viaAggregator: backend === AGGREGATOR_BACKEND,
    viaFallback,
  });
}

/**
 * Decides which backend handles calls for an alias. Pure: the same inputs always
 * give an equal decision, and nothing is cached between calls.
 *
 * - `openrouter`: always the aggregator.
 * - `direct`: the native backend; throws when it has no credential.
 * - `auto`: the native backend when credentialed, else the aggregator with `viaFallback`.
 *
 * @throws {RoutingUnavailableError} For `direct` without a native credential.
 * @throws {InvalidRequestError} If the alias cannot be resolved.
 */
export function resolveRoute(
  alias: string,
  configuredMode: RoutingMode,
  credentials: BackendCredentials,
  catalog: ModelCatalog
): RoutingDecision {
  const vendor = nativeBackendFor(resolveModelId(alias, catalog));

  switch (configuredMode) {
    case ROUTING_MODES.OPENROUTER:
      return decision(AGGREGATOR_BACKEND, vendor, configuredMode, false);
    case ROUTING_MODES.DIRECT:
      if (!hasCredential(credentials, vendor)) {
        throw new RoutingUnavailableError(alias, vendor);
      }
      return decision(vendor, vendor, configuredMode, false);
    case ROUTING_MODES.AUTO:
      if (vendor === AGGREGATOR_BACKEND || hasCredential(credentials, vendor)) {
        return decision(vendor, vendor, configuredMode, false);
      }
      return decision(AGGREGATOR_BACKEND, vendor, configuredMode, true);
  }
}

/**
 * Routing mode for an alias: its override if one is configured, else the default.
 */
export function resolveRoutingMode(alias: string, routing: RoutingConfig): RoutingMode {
  return getOwn(routing.overrides, alias) ?? routing.defaultMode;
}

/**
 * Model id to send to the chosen backend. The aggregator takes the vendor-prefixed
 * id; a native backend takes the catalog's direct id, or the aggregator id with its
 * vendor prefix removed.
 */
export function modelIdForRoute(alias: string, routing: RoutingDecision, catalog: ModelCatalog): string {
  const aggregatorId = resolveModelId(alias, catalog);
  if (routing.viaAggregator) {
    return aggregatorId;
  }
  const directId = getOwn(catalog, alias)?.direct;
  if (directId !== undefined) {
    return directId;
  }
  const separatorIndex = aggregatorId.indexOf(MODEL_ID_SEPARATOR);
  return separatorIndex >= 0 ? aggregatorId.slice(separatorIndex + 1) : aggregatorId;
}

/**
 * Everything the router needs to resolve a panel member.
 */
export interface RoutingInputs {
  readonly catalog: ModelCatalog;
  readonly routing: RoutingConfig;
  readonly credentials: BackendCredentials;
}

/**
 * Builds the panel member for an alias under the given configuration. A pure
 * function of its inputs, so resolving the same alias twice in a run gives equal members.
 */
export function resolvePanelMember(alias: string, inputs: RoutingInputs): PanelMember {
  const mode = resolveRoutingMode(alias, inputs.routing);
  const routing = resolveRoute(alias, mode, inputs.credentials, inputs.catalog);
  return Object.freeze({
    alias,
    modelId: modelIdForRoute(alias, routing, inputs.catalog),
    routing,
  });
}
