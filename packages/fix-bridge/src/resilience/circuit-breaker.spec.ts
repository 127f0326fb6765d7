import { CircuitBreaker, CircuitState, CircuitStateChange } from './circuit-breaker';
import { CircuitOpenError, RemoteCallError } from './resilience.errors';

describe('CircuitBreaker', () => {
  const makeBreaker = (failureThreshold = 2, recoveryTimeoutMs = 1000) => {
    let now = 10_000;
    const changes: CircuitStateChange[] = [];
    const breaker = new CircuitBreaker('primary', {
      failureThreshold,
      recoveryTimeoutMs,
      now: () => now,
      onStateChange: (change) => changes.push(change),
    });
    const advance = (ms: number) => {
      now += ms;
    };
    return { breaker, changes, advance };
  };

  const transient = () =>
    new RemoteCallError('Bad gateway', { dependency: 'primary', statusCode: 502 });

  const failing = () =>
    jest.fn(async () => {
      throw transient();
    });

  it('opens after the failure threshold and fails fast', async () => {
    const { breaker, changes } = makeBreaker(2);
    const operation = failing();

    await expect(breaker.execute(operation)).rejects.toBeInstanceOf(RemoteCallError);
    expect(breaker.getSnapshot().state).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(operation)).rejects.toBeInstanceOf(RemoteCallError);
    expect(breaker.getSnapshot().state).toBe(CircuitState.OPEN);

    await expect(breaker.execute(operation)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(changes).toEqual([
      { dependency: 'primary', from: CircuitState.CLOSED, to: CircuitState.OPEN, failureCount: 2 },
    ]);
  });

  it('resets the failure count on success', async () => {
    const { breaker } = makeBreaker(2);

    await expect(breaker.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);
    await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
    await expect(breaker.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);

    expect(breaker.getSnapshot()).toMatchObject({
      state: CircuitState.CLOSED,
      failureCount: 1,
    });
  });

  it('ignores failures that are not counted', async () => {
    const { breaker } = makeBreaker(1);
    const forbidden = new RemoteCallError('Forbidden', { dependency: 'primary', statusCode: 403 });
    const limited = new RemoteCallError('Slow down', { dependency: 'primary', statusCode: 429 });

    await expect(breaker.execute(async () => Promise.reject(forbidden))).rejects.toBe(forbidden);
    await expect(breaker.execute(async () => Promise.reject(limited))).rejects.toBe(limited);

    expect(breaker.getSnapshot()).toMatchObject({ state: CircuitState.CLOSED, failureCount: 0 });
  });

  it('stays open until the recovery timeout has fully elapsed', async () => {
    const { breaker, advance } = makeBreaker(1, 1000);
    await expect(breaker.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);

    advance(999);
    const rejection = breaker.execute(async () => 'ok');
    await expect(rejection).rejects.toBeInstanceOf(CircuitOpenError);
    await expect(rejection).rejects.toMatchObject({ retryInMs: 1 });

    advance(1);
    await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
    expect(breaker.getSnapshot()).toMatchObject({ state: CircuitState.CLOSED, failureCount: 0 });
  });

  it('re-opens when the half-open probe fails', async () => {
    const { breaker, advance, changes } = makeBreaker(1, 1000);
    await expect(breaker.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);

    advance(1000);
    await expect(breaker.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);
    expect(breaker.getSnapshot().state).toBe(CircuitState.OPEN);

    // lastFailureAt moved to the probe failure
    advance(999);
    await expect(breaker.execute(async () => 'ok')).rejects.toBeInstanceOf(CircuitOpenError);

    expect(changes.map((c) => c.to)).toEqual([
      CircuitState.OPEN,
      CircuitState.HALF_OPEN,
      CircuitState.OPEN,
    ]);
  });

  it('lets exactly one probe through while half-open', async () => {
    const { breaker, advance } = makeBreaker(1, 1000);
    await expect(breaker.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);
    advance(1000);

    let finishProbe: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      finishProbe = resolve;
    });
    const probe = breaker.execute(async () => {
      await gate;
      return 'probe';
    });

    const concurrent = jest.fn(async () => 'second');
    await expect(breaker.execute(concurrent)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(concurrent).not.toHaveBeenCalled();
    expect(breaker.getSnapshot().state).toBe(CircuitState.HALF_OPEN);

    finishProbe();
    await expect(probe).resolves.toBe('probe');
    expect(breaker.getSnapshot().state).toBe(CircuitState.CLOSED);
  });

  it('frees the probe slot when the probe fails with an uncounted error', async () => {
    const { breaker, advance } = makeBreaker(1, 1000);
    await expect(breaker.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);
    advance(1000);

    const forbidden = new RemoteCallError('Forbidden', { dependency: 'primary', statusCode: 403 });
    await expect(breaker.execute(async () => Promise.reject(forbidden))).rejects.toBe(forbidden);
    expect(breaker.getSnapshot().state).toBe(CircuitState.HALF_OPEN);

    await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
    expect(breaker.getSnapshot().state).toBe(CircuitState.CLOSED);
  });

  it('keeps breakers for different dependencies independent', async () => {
    const primary = makeBreaker(1).breaker;
    const fallback = new CircuitBreaker('fallback', { failureThreshold: 1, recoveryTimeoutMs: 1000 });

    await expect(primary.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);

    expect(primary.getSnapshot().state).toBe(CircuitState.OPEN);
    await expect(fallback.execute(async () => 'ok')).resolves.toBe('ok');
    expect(fallback.getSnapshot().state).toBe(CircuitState.CLOSED);
  });

  it('can be reset manually', async () => {
    const { breaker } = makeBreaker(1);
    await expect(breaker.execute(failing())).rejects.toBeInstanceOf(RemoteCallError);

    await breaker.reset();

    expect(breaker.getSnapshot()).toMatchObject({
      state: CircuitState.CLOSED,
      failureCount: 0,
      lastFailureAt: null,
    });
  });
});
