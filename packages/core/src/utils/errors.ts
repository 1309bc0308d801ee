import { EXIT_CONFIG_ERROR, EXIT_GENERAL_ERROR, EXIT_INVALID_ARGS, EXIT_PROVIDER_ERROR } from './exit-codes';

/**
 * Base class for every error the debate core raises. Carries a numeric exit code
 * so the CLI can map failures without inspecting messages.
 */
export class DebateError extends Error {
  readonly code: number;

  constructor(message: string, code: number = EXIT_GENERAL_ERROR) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Caller contract violation: a backend request with both or neither of
 * `messages`/`prompt`, or an orchestrator precondition (empty panel, bad round
 * count, unresolvable alias). Raised before any network call.
 */
export class InvalidRequestError extends DebateError {
  constructor(message: string) {
    super(message, EXIT_INVALID_ARGS);
  }
}

/**
 * `direct` routing was requested for an alias whose native backend has no credential.
 */
export class RoutingUnavailableError extends DebateError {
  constructor(readonly alias: string, readonly backend: string) {
    super(`Direct routing for '${alias}' requires a ${backend} API key, but none is configured`, EXIT_CONFIG_ERROR);
  }
}

/**
 * A backend client could not be constructed: missing API key or malformed base URL.
 */
export class BackendConfigError extends DebateError {
  constructor(message: string) {
    super(message, EXIT_CONFIG_ERROR);
  }
}

export const BACKEND_CALL_ERROR_KINDS = {
  TRANSPORT: 'transport',
  VENDOR: 'vendor',
  TIMEOUT: 'timeout',
} as const;

export type BackendCallErrorKind = (typeof BACKEND_CALL_ERROR_KINDS)[keyof typeof BACKEND_CALL_ERROR_KINDS];

/**
 * Failure of one backend call. Clients build these internally and fold them into
 * the result's `error` text; they never escape `complete()`.
 */
export class BackendCallError extends DebateError {
  constructor(
    message: string,
    readonly kind: BackendCallErrorKind,
    readonly status?: number
  ) {
    super(message, EXIT_PROVIDER_ERROR);
  }
}

/**
 * An observer hook threw or rejected. Logged by the engine, never propagated.
 */
export class ObserverError extends DebateError {
  constructor(readonly hookName: string, readonly failure: unknown) {
    super(`${hookName} callback failed: ${getErrorMessage(failure)}`);
  }
}

/**
 * Safely extracts an error message from an unknown error value.
 *
 * @param error - The error value (unknown type from catch clause).
 * @returns A string representation of the error message.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
