/**
 * Error Classification
 *
 * Decides how a failed remote call is treated, independently of how the
 * failure is finally reported to the caller:
 * - TRANSIENT: timeouts, connection errors, 5xx - retried, counted by breakers
 * - RATE_LIMITED: 429, or 503 with Retry-After - handled by the rate-limit
 *   policy, never counted
 * - PERMANENT: other 4xx, malformed responses, programming errors
 * - CIRCUIT_OPEN: breaker rejection, dispatch skips straight to fallback
 * - CANCELLED: caller gave up, never retried
 */

import { BulkheadRejectedError, TaskCancelledError } from 'cockatiel';
import {
  CancellationError,
  CircuitOpenError,
  RemoteCallError,
} from './resilience.errors';

export enum FailureKind {
  TRANSIENT = 'TRANSIENT',
  RATE_LIMITED = 'RATE_LIMITED',
  PERMANENT = 'PERMANENT',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  CANCELLED = 'CANCELLED',
}

export interface FailureDescription {
  kind: FailureKind;
  message: string;
  dependency?: string;
  statusCode?: number;
  code?: string;
}

// Set by RemoteHttp when its own bulkhead turns a call away
export const LOCAL_REJECTION_CODE = 'EBULKHEAD';

// Transport codes that mean the remote answered with something unusable
const PERMANENT_CODES = new Set(['EBADRESPONSE', 'ERR_BAD_OPTION', 'ERR_INVALID_URL']);

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof CancellationError) {
    return FailureKind.CANCELLED;
  }

  if (error instanceof CircuitOpenError) {
    return FailureKind.CIRCUIT_OPEN;
  }

  if (error instanceof TaskCancelledError || error instanceof BulkheadRejectedError) {
    return FailureKind.TRANSIENT;
  }

  if (error instanceof RemoteCallError) {
    const { statusCode, code } = error;

    if (statusCode !== undefined) {
      if (statusCode === 429) return FailureKind.RATE_LIMITED;
      // An overloaded remote that says when to come back
      if (statusCode === 503 && error.retryAfterMs !== undefined) {
        return FailureKind.RATE_LIMITED;
      }
      if (statusCode === 408 || statusCode >= 500) return FailureKind.TRANSIENT;
      return FailureKind.PERMANENT;
    }

    if (code && PERMANENT_CODES.has(code)) {
      return FailureKind.PERMANENT;
    }

    // No response at all: connection refused/reset, DNS, timeout
    return FailureKind.TRANSIENT;
  }

  return FailureKind.PERMANENT;
}

export function isTransientFailure(error: unknown): boolean {
  return classifyFailure(error) === FailureKind.TRANSIENT;
}

// Transient failures caused by the remote itself, not by the local bulkhead
export function isDependencyFailure(error: unknown): boolean {
  if (error instanceof BulkheadRejectedError) {
    return false;
  }
  if (error instanceof RemoteCallError && error.code === LOCAL_REJECTION_CODE) {
    return false;
  }
  return isTransientFailure(error);
}

export function isRateLimited(error: unknown): boolean {
  return classifyFailure(error) === FailureKind.RATE_LIMITED;
}

export function retryAfterMs(error: unknown): number | undefined {
  return error instanceof RemoteCallError ? error.retryAfterMs : undefined;
}

/**
 * Parse a Retry-After header value (delta seconds or HTTP date)
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw === 'number') {
    return raw >= 0 ? raw * 1000 : undefined;
  }
  if (typeof raw !== 'string' || raw.trim() === '') {
    return undefined;
  }

  if (/^\d+$/.test(raw.trim())) {
    return parseInt(raw.trim(), 10) * 1000;
  }

  const date = Date.parse(raw);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

export function describeFailure(error: unknown): FailureDescription {
  const kind = classifyFailure(error);
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof RemoteCallError) {
    return {
      kind,
      message,
      dependency: error.dependency,
      statusCode: error.statusCode,
      code: error.code,
    };
  }

  if (error instanceof CircuitOpenError) {
    return { kind, message, dependency: error.dependency };
  }

  return { kind, message };
}
