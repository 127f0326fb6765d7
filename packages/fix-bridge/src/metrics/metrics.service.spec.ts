import { CircuitState } from '../resilience/circuit-breaker';
import { RunStatus } from '../runs/run.types';
import { MetricsService } from './metrics.service';

describe('MetricsService', () => {
  it('exposes dispatch, run and circuit metrics in Prometheus text format', async () => {
    const metrics = new MetricsService();

    metrics.onRunCreated();
    metrics.onDispatchAttempt({ runId: 'run_1', executor: 'agent-api', attempt: 1 });
    metrics.onDispatchAttempt({ runId: 'run_1', executor: 'agent-api', attempt: 2 });
    metrics.onCircuitStateChanged({
      dependency: 'agent-api',
      from: CircuitState.CLOSED,
      to: CircuitState.OPEN,
      failureCount: 5,
    });
    metrics.onRunStatusChanged({
      runId: 'run_1',
      correlationKey: 'TICK-1',
      from: RunStatus.RUNNING,
      to: RunStatus.COMPLETED,
      usedFallback: false,
      durationMs: 2500,
    });

    const text = await metrics.getMetrics();

    expect(text).toContain('fix_bridge_runs_created_total 1\n');
    expect(text).toContain('fix_bridge_dispatch_attempts_total{executor="agent-api"} 2\n');
    expect(text).toContain('fix_bridge_circuit_open{dependency="agent-api"} 1\n');
    expect(text).toContain('fix_bridge_run_duration_seconds_sum{status="COMPLETED"} 2.5\n');
    expect(text).toContain('fix_bridge_run_duration_seconds_count{status="COMPLETED"} 1\n');
  });

  it('only counts terminal status changes as finished runs', async () => {
    const metrics = new MetricsService();

    metrics.onRunStatusChanged({
      runId: 'run_1',
      correlationKey: 'TICK-1',
      from: RunStatus.CREATED,
      to: RunStatus.RUNNING,
      usedFallback: false,
      durationMs: 10,
    });

    const text = await metrics.getMetrics();
    expect(text).not.toContain('fix_bridge_runs_finished_total{');
    expect(text).not.toContain('fix_bridge_run_duration_seconds_count{');
  });

  it('counts callbacks by outcome and closes the circuit gauge on recovery', async () => {
    const metrics = new MetricsService();

    metrics.onCallbackReceived({ outcome: 'applied', status: RunStatus.COMPLETED });
    metrics.onCallbackReceived({ outcome: 'duplicate' });
    metrics.onCallbackReceived({ outcome: 'duplicate' });
    metrics.onCircuitStateChanged({
      dependency: 'jira',
      from: CircuitState.HALF_OPEN,
      to: CircuitState.CLOSED,
      failureCount: 0,
    });

    const text = await metrics.getMetrics();
    expect(text).toContain('fix_bridge_callbacks_total{outcome="applied"} 1\n');
    expect(text).toContain('fix_bridge_callbacks_total{outcome="duplicate"} 2\n');
    expect(text).toContain('fix_bridge_circuit_open{dependency="jira"} 0\n');
  });
});
