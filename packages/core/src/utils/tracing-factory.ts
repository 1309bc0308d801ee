import { Langfuse } from 'langfuse';

import type { BackendClient } from '../backends/backend-client';
import { TraceMetadata, TraceOption, TracingContext, TRACE_OPTIONS } from '../types/tracing.types';

import { logWarning } from './console';
import { getErrorMessage } from './errors';
import { TracingBackendClient } from './tracing-backend-client';

/**
 * Default Langfuse base URL if not specified in environment.
 */
const DEFAULT_LANGFUSE_BASE_URL = 'https://cloud.langfuse.com';

/**
 * Environment variable names for Langfuse configuration.
 */
const LANGFUSE_SECRET_KEY_ENV = 'LANGFUSE_SECRET_KEY';
const LANGFUSE_PUBLIC_KEY_ENV = 'LANGFUSE_PUBLIC_KEY';
const LANGFUSE_BASE_URL_ENV = 'LANGFUSE_BASE_URL';

interface LangfuseKeys {
  secretKey: string;
  publicKey: string;
}

/**
 * Validates that Langfuse environment variables are set and non-empty.
 *
 * @returns The secret and public keys.
 * @throws {Error} If required environment variables are missing or empty.
 */
export function validateLangfuseConfig(): LangfuseKeys {
  const secretKey = process.env[LANGFUSE_SECRET_KEY_ENV];
  const publicKey = process.env[LANGFUSE_PUBLIC_KEY_ENV];

  if (!secretKey || secretKey.trim() === '') {
    throw new Error(`${LANGFUSE_SECRET_KEY_ENV} is not set or is empty`);
  }

  if (!publicKey || publicKey.trim() === '') {
    throw new Error(`${LANGFUSE_PUBLIC_KEY_ENV} is not set or is empty`);
  }

  return { secretKey, publicKey };
}

/**
 * Creates a tracing context for one debate if tracing is enabled.
 *
 * @param trace - The configured trace option (tracing is off when undefined).
 * @param traceMetadata - Metadata to include in the trace.
 * @param traceName - Name for the trace.
 * @param tags - Tags to attach to the trace.
 * @returns Tracing context if tracing is enabled and config is valid, undefined otherwise.
 */
export function createTracingContext(
  trace: TraceOption | undefined,
  traceMetadata: TraceMetadata,
  traceName: string,
  tags: string[] = []
): TracingContext | undefined {
  if (trace !== TRACE_OPTIONS.LANGFUSE) {
    return undefined;
  }

  try {
    const { secretKey, publicKey } = validateLangfuseConfig();
    const baseUrl = process.env[LANGFUSE_BASE_URL_ENV] || DEFAULT_LANGFUSE_BASE_URL;

    const langfuse = new Langfuse({
      secretKey,
      publicKey,
      baseUrl,
    });

    const debateTrace = langfuse.trace({
      name: traceName,
      metadata: traceMetadata,
      ...(tags.length > 0 && { tags }),
    });

    return { langfuse, trace: debateTrace };
  } catch (error: unknown) {
    // Tracing is optional; the debate runs without it.
    logWarning(`Failed to create Langfuse tracing context: ${getErrorMessage(error)}`);
    return undefined;
  }
}

/**
 * Wraps a backend client with tracing if a tracing context is provided.
 *
 * @param client - The client to wrap.
 * @param tracingContext - Optional tracing context. If undefined, returns the original client.
 */
export function createTracingClient(client: BackendClient, tracingContext?: TracingContext): BackendClient {
  if (!tracingContext) {
    return client;
  }
  return new TracingBackendClient(client, tracingContext);
}

/**
 * Flushes pending Langfuse events. Failures are logged, never thrown.
 */
export async function flushTracing(tracingContext?: TracingContext): Promise<void> {
  if (!tracingContext) {
    return;
  }
  try {
    await tracingContext.langfuse.flushAsync();
  } catch (error: unknown) {
    logWarning(`Failed to flush Langfuse traces: ${getErrorMessage(error)}`);
  }
}
