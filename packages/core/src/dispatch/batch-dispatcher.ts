import { BackendClient, erroredResult } from '../backends/backend-client';
import { BackendKind, RoundResult, RoutedRequest } from '../types/backend.types';
import { getErrorMessage } from '../utils/errors';
import { defaultLogger, Logger } from '../utils/logger';

/**
 * Executes a batch of routed requests and returns one result per request, in
 * request order. The round engine depends only on this interface.
 */
export interface Dispatcher {
  dispatch(requests: readonly RoutedRequest[]): Promise<RoundResult[]>;
}

function stampRouting(result: RoundResult, request: RoutedRequest): RoundResult {
  return Object.freeze({ ...result, routing: request.routing });
}

/**
 * Groups requests by backend, runs every group's `completeParallel` at the same
 * time, and merges the results back into input order. This is the only place
 * results from different backends are combined.
 */
export class BatchDispatcher implements Dispatcher {
  private readonly clients: ReadonlyMap<BackendKind, BackendClient>;

  constructor(clients: Iterable<BackendClient>, private readonly logger: Logger = defaultLogger) {
    this.clients = new Map([...clients].map((client) => [client.kind, client]));
  }

  async dispatch(requests: readonly RoutedRequest[]): Promise<RoundResult[]> {
    const partitions = new Map<BackendKind, number[]>();
    requests.forEach((request, index) => {
      const indices = partitions.get(request.routing.backend) ?? [];
      indices.push(index);
      partitions.set(request.routing.backend, indices);
    });

    const merged = new Array<RoundResult | undefined>(requests.length);
    await Promise.all(
      [...partitions].map(async ([backend, indices]) => {
        const batch = indices.map((index) => requestAt(requests, index));
        const results = await this.runPartition(backend, batch);
        indices.forEach((requestIndex, position) => {
          const request = requestAt(requests, requestIndex);
          const result = results[position] ?? erroredResult(request, `No result returned by ${backend}`);
          merged[requestIndex] = stampRouting(result, request);
        });
      })
    );

    return merged.map((result, index) => {
      if (result !== undefined) {
        return result;
      }
      const request = requestAt(requests, index);
      return stampRouting(erroredResult(request, 'Request was not dispatched'), request);
    });
  }

  private async runPartition(backend: BackendKind, batch: RoutedRequest[]): Promise<RoundResult[]> {
    const client = this.clients.get(backend);
    if (!client || !client.isOpen()) {
      const message = `No open client for backend '${backend}'`;
      this.logger.warn(message);
      return batch.map((request) => erroredResult(request, message));
    }
    try {
      return await client.completeParallel(batch);
    } catch (error: unknown) {
      const message = `${backend} batch failed: ${getErrorMessage(error)}`;
      this.logger.warn(message);
      return batch.map((request) => erroredResult(request, message));
    }
  }
}

function requestAt(requests: readonly RoutedRequest[], index: number): RoutedRequest {
  const request = requests[index];
  if (request === undefined) {
    throw new Error(`No request at index ${index}`);
  }
  return request;
}
