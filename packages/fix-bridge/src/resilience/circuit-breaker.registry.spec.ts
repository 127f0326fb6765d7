import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { BulkheadRejectedError } from 'cockatiel';
import { CircuitState } from './circuit-breaker';
import { CIRCUIT_STATE_CHANGED, CircuitBreakerRegistry } from './circuit-breaker.registry';
import { RemoteCallError } from './resilience.errors';

describe('CircuitBreakerRegistry', () => {
  const makeRegistry = () => {
    const eventEmitter = new EventEmitter2();
    const emitSpy = jest.spyOn(eventEmitter, 'emit');
    const registry = new CircuitBreakerRegistry(
      new ConfigService({
        CIRCUIT_BREAKER_FAILURE_THRESHOLD: '1',
        CIRCUIT_BREAKER_RECOVERY_TIMEOUT_MS: '60000',
      }),
      eventEmitter,
    );
    return { registry, emitSpy };
  };

  const rejectWith = (error: Error) => async (): Promise<never> => {
    throw error;
  };

  it('does not count local bulkhead rejections against the remote', async () => {
    const { registry } = makeRegistry();
    const breaker = registry.get('agent-api');
    const rejected = new RemoteCallError('agent-api concurrency limit reached', {
      dependency: 'agent-api',
      code: 'EBULKHEAD',
    });

    await expect(breaker.execute(rejectWith(rejected))).rejects.toBe(rejected);
    await expect(
      breaker.execute(rejectWith(new BulkheadRejectedError(5, 5))),
    ).rejects.toBeInstanceOf(BulkheadRejectedError);

    expect(breaker.getSnapshot()).toMatchObject({ state: CircuitState.CLOSED, failureCount: 0 });
  });

  it('opens on remote failures and publishes the change', async () => {
    const { registry, emitSpy } = makeRegistry();
    const breaker = registry.get('agent-api');

    await expect(
      breaker.execute(
        rejectWith(
          new RemoteCallError('agent-api responded 502', { dependency: 'agent-api', statusCode: 502 }),
        ),
      ),
    ).rejects.toBeInstanceOf(RemoteCallError);

    expect(breaker.getSnapshot().state).toBe(CircuitState.OPEN);
    expect(emitSpy).toHaveBeenCalledWith(CIRCUIT_STATE_CHANGED, {
      dependency: 'agent-api',
      from: CircuitState.CLOSED,
      to: CircuitState.OPEN,
      failureCount: 1,
    });
  });

  it('returns the same breaker for a dependency and resets it on request', async () => {
    const { registry } = makeRegistry();

    expect(registry.get('jira')).toBe(registry.get('jira'));
    expect(await registry.reset('jira')).toBe(true);
    expect(await registry.reset('unknown')).toBe(false);
    expect(registry.snapshots().map((snapshot) => snapshot.dependency)).toEqual(['jira']);
  });
});
