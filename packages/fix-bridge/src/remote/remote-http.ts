/**
 * Remote HTTP
 *
 * Wraps an axios instance with a cockatiel bulkhead (concurrency isolation
 * per remote) and an aggressive per-call timeout. Every failure leaves here
 * as a RemoteCallError or CancellationError, so callers classify errors
 * without looking at axios or cockatiel types.
 */

import {
  AxiosInstance,
  AxiosRequestConfig,
  AxiosResponse,
  isAxiosError,
} from 'axios';
import {
  BulkheadPolicy,
  BulkheadRejectedError,
  TaskCancelledError,
  TimeoutPolicy,
  TimeoutStrategy,
  bulkhead,
  timeout,
} from 'cockatiel';
import { LOCAL_REJECTION_CODE, parseRetryAfter } from '../resilience/error-classification';
import { CancellationError, RemoteCallError, abortReason } from '../resilience/resilience.errors';

export interface RemoteHttpOptions {
  dependency: string;
  timeoutMs: number;
  maxConcurrent: number;
  maxQueue: number;
}

export class RemoteHttp {
  readonly dependency: string;
  private readonly bulkheadPolicy: BulkheadPolicy;
  private readonly timeoutPolicy: TimeoutPolicy;

  constructor(
    private readonly client: AxiosInstance,
    private readonly options: RemoteHttpOptions,
  ) {
    this.dependency = options.dependency;
    this.bulkheadPolicy = bulkhead(options.maxConcurrent, options.maxQueue);
    this.timeoutPolicy = timeout(options.timeoutMs, TimeoutStrategy.Aggressive);
  }

  /**
   * Send a request; any status outside expectedStatus becomes a RemoteCallError
   */
  async request<T = unknown>(
    config: AxiosRequestConfig,
    expectedStatus: number[],
    signal?: AbortSignal,
  ): Promise<AxiosResponse<T>> {
    let response: AxiosResponse<T>;
    try {
      response = await this.bulkheadPolicy.execute(
        () =>
          this.timeoutPolicy.execute(
            ({ signal: callSignal }) =>
              this.client.request<T>({
                ...config,
                signal: callSignal,
                validateStatus: () => true,
              }),
            signal,
          ),
        signal,
      );
    } catch (error) {
      throw this.translate(error, config, signal);
    }

    if (!expectedStatus.includes(response.status)) {
      throw new RemoteCallError(
        `${this.dependency} responded ${response.status} to ${describeRequest(config)}`,
        {
          dependency: this.dependency,
          statusCode: response.status,
          retryAfterMs: parseRetryAfter(response.headers['retry-after']),
          responseBody: response.data,
        },
      );
    }

    return response;
  }

  private translate(error: unknown, config: AxiosRequestConfig, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return new CancellationError(abortReason(signal));
    }

    if (error instanceof TaskCancelledError) {
      return new RemoteCallError(
        `${this.dependency} timed out after ${this.options.timeoutMs}ms on ${describeRequest(config)}`,
        { dependency: this.dependency, code: 'ETIMEDOUT' },
      );
    }

    if (error instanceof BulkheadRejectedError) {
      return new RemoteCallError(`${this.dependency} concurrency limit reached`, {
        dependency: this.dependency,
        code: LOCAL_REJECTION_CODE,
      });
    }

    if (isAxiosError(error)) {
      return new RemoteCallError(`${this.dependency} request failed: ${error.message}`, {
        dependency: this.dependency,
        statusCode: error.response?.status,
        code: error.code,
      });
    }

    return error instanceof Error ? error : new Error(String(error));
  }
}

function describeRequest(config: AxiosRequestConfig): string {
  return `${(config.method ?? 'get').toUpperCase()} ${config.url ?? '/'}`;
}
