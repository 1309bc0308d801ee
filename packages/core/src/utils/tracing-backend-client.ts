import type { BackendClient } from '../backends/backend-client';
import type { BackendKind, BackendRequest, RoundResult } from '../types/backend.types';
import { SPAN_LEVEL, TracingContext } from '../types/tracing.types';

import { logWarning } from './console';
import { getErrorMessage } from './errors';

/**
 * Tracing decorator for backend clients. Records one Langfuse generation per
 * completed call on the debate's trace, timed from the result's latency.
 *
 * Calls are recorded after they finish, so the wrapped client keeps its own
 * concurrency cap and a tracing failure can never affect the call itself.
 */
export class TracingBackendClient implements BackendClient {
  readonly kind: BackendKind;

  constructor(
    private readonly wrappedClient: BackendClient,
    private readonly tracingContext: TracingContext
  ) {
    this.kind = wrappedClient.kind;
  }

  open(): Promise<void> {
    return this.wrappedClient.open();
  }

  close(): Promise<void> {
    return this.wrappedClient.close();
  }

  isOpen(): boolean {
    return this.wrappedClient.isOpen();
  }

  async complete(request: BackendRequest): Promise<RoundResult> {
    const result = await this.wrappedClient.complete(request);
    this.recordGeneration(request, result);
    return result;
  }

  async completeParallel(requests: readonly BackendRequest[]): Promise<RoundResult[]> {
    const results = await this.wrappedClient.completeParallel(requests);
    results.forEach((result, index) => {
      const request = requests[index];
      if (request !== undefined) {
        this.recordGeneration(request, result);
      }
    });
    return results;
  }

  private recordGeneration(request: BackendRequest, result: RoundResult): void {
    try {
      const endTime = result.timestamp;
      const startTime = new Date(endTime.getTime() - result.latencyMs);
      const usage = result.usage
        ? {
            input: result.usage.inputTokens ?? null,
            output: result.usage.outputTokens ?? null,
            total: result.usage.totalTokens ?? null,
            unit: 'TOKENS' as const,
          }
        : undefined;

      this.tracingContext.trace.generation({
        name: `${request.role}-${request.alias}`,
        model: request.modelId,
        startTime,
        endTime,
        input: request.messages ?? request.prompt,
        metadata: {
          alias: request.alias,
          backend: this.kind,
          roundNumber: request.roundNumber,
        },
        ...(result.error === undefined
          ? { output: result.content }
          : { level: SPAN_LEVEL.ERROR, statusMessage: result.error }),
        ...(usage !== undefined && { usage }),
      });
    } catch (tracingError: unknown) {
      logWarning(`Langfuse tracing failed for ${request.alias}: ${getErrorMessage(tracingError)}`);
    }
  }
}
