import { BulkheadRejectedError, TaskCancelledError } from 'cockatiel';
import {
  FailureKind,
  classifyFailure,
  describeFailure,
  parseRetryAfter,
} from './error-classification';
import { CancellationError, CircuitOpenError, RemoteCallError } from './resilience.errors';

describe('classifyFailure', () => {
  const withStatus = (statusCode: number) =>
    new RemoteCallError(`HTTP ${statusCode}`, { dependency: 'agent-api', statusCode });

  it.each([
    [500, FailureKind.TRANSIENT],
    [503, FailureKind.TRANSIENT],
    [408, FailureKind.TRANSIENT],
    [429, FailureKind.RATE_LIMITED],
    [400, FailureKind.PERMANENT],
    [401, FailureKind.PERMANENT],
    [404, FailureKind.PERMANENT],
  ])('classifies HTTP %i as %s', (status, kind) => {
    expect(classifyFailure(withStatus(status))).toBe(kind);
  });

  it('treats a 503 carrying Retry-After as rate limited', () => {
    const overloaded = new RemoteCallError('HTTP 503', {
      dependency: 'agent-api',
      statusCode: 503,
      retryAfterMs: 5000,
    });

    expect(classifyFailure(overloaded)).toBe(FailureKind.RATE_LIMITED);
    expect(classifyFailure(withStatus(503))).toBe(FailureKind.TRANSIENT);
  });

  it('treats connection failures as transient and malformed responses as permanent', () => {
    expect(
      classifyFailure(
        new RemoteCallError('connect ECONNREFUSED', { dependency: 'agent-api', code: 'ECONNREFUSED' }),
      ),
    ).toBe(FailureKind.TRANSIENT);
    expect(
      classifyFailure(
        new RemoteCallError('missing run id', { dependency: 'agent-api', code: 'EBADRESPONSE' }),
      ),
    ).toBe(FailureKind.PERMANENT);
  });

  it('classifies the synthetic failures', () => {
    expect(classifyFailure(new CircuitOpenError('agent-api', 100))).toBe(FailureKind.CIRCUIT_OPEN);
    expect(classifyFailure(new CancellationError())).toBe(FailureKind.CANCELLED);
    expect(classifyFailure(new TaskCancelledError())).toBe(FailureKind.TRANSIENT);
    expect(classifyFailure(new BulkheadRejectedError(10, 50))).toBe(FailureKind.TRANSIENT);
  });

  it('treats unknown errors as permanent', () => {
    expect(classifyFailure(new TypeError('x is undefined'))).toBe(FailureKind.PERMANENT);
    expect(classifyFailure('boom')).toBe(FailureKind.PERMANENT);
  });

  it('describes remote failures with their dependency and status', () => {
    expect(describeFailure(withStatus(503))).toEqual({
      kind: FailureKind.TRANSIENT,
      message: 'HTTP 503',
      dependency: 'agent-api',
      statusCode: 503,
      code: undefined,
    });
  });
});

describe('parseRetryAfter', () => {
  it('parses delta seconds', () => {
    expect(parseRetryAfter('30')).toBe(30000);
    expect(parseRetryAfter(['5'])).toBe(5000);
  });

  it('parses HTTP dates relative to now', () => {
    const now = Date.parse('2024-01-01T00:00:00Z');
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:10 GMT', now)).toBe(10000);
    expect(parseRetryAfter('Sun, 31 Dec 2023 23:59:00 GMT', now)).toBe(0);
  });

  it('ignores missing or garbage values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
