/**
 * Errors raised by the resilience layer and by remote clients.
 *
 * Remote clients translate every transport failure into a RemoteCallError so
 * that classification never has to look at axios or cockatiel internals.
 */

export interface RemoteCallErrorDetails {
  dependency: string;
  statusCode?: number;
  // Transport error code (ECONNREFUSED, ETIMEDOUT, EBADRESPONSE, ...)
  code?: string;
  retryAfterMs?: number;
  responseBody?: unknown;
}

export class RemoteCallError extends Error {
  readonly dependency: string;
  readonly statusCode?: number;
  readonly code?: string;
  readonly retryAfterMs?: number;
  readonly responseBody?: unknown;

  constructor(message: string, details: RemoteCallErrorDetails) {
    super(message);
    this.name = 'RemoteCallError';
    this.dependency = details.dependency;
    this.statusCode = details.statusCode;
    this.code = details.code;
    this.retryAfterMs = details.retryAfterMs;
    this.responseBody = details.responseBody;
  }
}

export class CircuitOpenError extends Error {
  constructor(
    readonly dependency: string,
    readonly retryInMs: number,
  ) {
    super(
      `Circuit breaker is OPEN for ${dependency} - service unavailable. ` +
        `Retry in ${Math.ceil(retryInMs / 1000)}s`,
    );
    this.name = 'CircuitOpenError';
  }
}

export class CancellationError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancellationError';
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationError(abortReason(signal));
  }
}

export function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.message) {
    return `Operation cancelled: ${reason.message}`;
  }
  return 'Operation cancelled';
}
