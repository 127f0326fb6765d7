import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { CALLBACK_RECEIVED } from '../callbacks/callback-handler.service';
import {
  DISPATCH_ATTEMPT,
  DISPATCH_CANCELLED,
  DISPATCH_FAILED,
  DISPATCH_FALLBACK,
  DISPATCH_RETRY_SCHEDULED,
  DISPATCH_SUCCEEDED,
} from '../dispatch/task-dispatcher.service';
import {
  NOTIFICATION_FAILED,
  NOTIFICATION_SENT,
} from '../notifications/run-notification.service';
import { CIRCUIT_STATE_CHANGED } from '../resilience/circuit-breaker.registry';
import { CircuitState, CircuitStateChange } from '../resilience/circuit-breaker';
import {
  RUN_CREATED,
  RUN_STATUS_CHANGED,
  RunStatusChangedEvent,
} from '../runs/run-registry.service';
import { isTerminal } from '../runs/run.types';

type DispatchAttemptEvent = {
  runId: string;
  executor: string;
  attempt: number;
};

type DispatchRetryEvent = {
  runId: string;
  executor: string;
  delayMs: number;
  reason: string;
};

type DispatchSucceededEvent = {
  runId: string;
  executor: string;
  usedFallback: boolean;
  attempts: number;
};

type DispatchFallbackEvent = {
  runId: string;
  from: string;
  to: string;
  reason: string;
};

type DispatchFailedEvent = {
  runId: string;
  primaryKind: string;
  fallbackKind?: string;
};

type CallbackReceivedEvent = {
  outcome: string;
  status?: string;
};

type NotificationEvent = {
  runId: string;
  notifier: string;
};

@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);
  private readonly registry = new Registry();

  private readonly dispatchAttemptsTotal = new Counter({
    name: 'fix_bridge_dispatch_attempts_total',
    help: 'Primary dispatch attempts admitted by the circuit breaker',
    labelNames: ['executor'] as const,
    registers: [this.registry],
  });

  private readonly dispatchRetriesTotal = new Counter({
    name: 'fix_bridge_dispatch_retries_total',
    help: 'Backoff waits scheduled before another primary attempt',
    labelNames: ['executor', 'reason'] as const,
    registers: [this.registry],
  });

  private readonly dispatchRetryDelaySeconds = new Histogram({
    name: 'fix_bridge_dispatch_retry_delay_seconds',
    help: 'Backoff wait before the next primary attempt (seconds)',
    labelNames: ['reason'] as const,
    buckets: [0.5, 1, 2, 4, 8, 16, 30, 60],
    registers: [this.registry],
  });

  private readonly dispatchStartedTotal = new Counter({
    name: 'fix_bridge_dispatch_started_total',
    help: 'Runs accepted by a remote execution path',
    labelNames: ['executor', 'used_fallback'] as const,
    registers: [this.registry],
  });

  private readonly dispatchFallbackTotal = new Counter({
    name: 'fix_bridge_dispatch_fallback_total',
    help: 'Dispatches moved from the primary to the fallback path',
    labelNames: ['from', 'to', 'reason'] as const,
    registers: [this.registry],
  });

  private readonly dispatchFailedTotal = new Counter({
    name: 'fix_bridge_dispatch_failed_total',
    help: 'Dispatches where every execution path failed',
    labelNames: ['primary_kind', 'fallback_kind'] as const,
    registers: [this.registry],
  });

  private readonly dispatchCancelledTotal = new Counter({
    name: 'fix_bridge_dispatch_cancelled_total',
    help: 'Runs cancelled by request, deadline or client disconnect',
    registers: [this.registry],
  });

  private readonly runsCreatedTotal = new Counter({
    name: 'fix_bridge_runs_created_total',
    help: 'Runs registered',
    registers: [this.registry],
  });

  private readonly runsFinishedTotal = new Counter({
    name: 'fix_bridge_runs_finished_total',
    help: 'Runs that reached a terminal status',
    labelNames: ['status', 'used_fallback'] as const,
    registers: [this.registry],
  });

  private readonly runDurationSeconds = new Histogram({
    name: 'fix_bridge_run_duration_seconds',
    help: 'Time from run creation to its terminal status (seconds)',
    labelNames: ['status'] as const,
    buckets: [1, 5, 15, 30, 60, 120, 300, 600, 1200, 1800, 3600],
    registers: [this.registry],
  });

  private readonly circuitOpen = new Gauge({
    name: 'fix_bridge_circuit_open',
    help: 'Circuit breaker open state (1=open, 0=closed or half-open)',
    labelNames: ['dependency'] as const,
    registers: [this.registry],
  });

  private readonly circuitTransitionsTotal = new Counter({
    name: 'fix_bridge_circuit_transitions_total',
    help: 'Circuit breaker state changes',
    labelNames: ['dependency', 'to'] as const,
    registers: [this.registry],
  });

  private readonly callbacksTotal = new Counter({
    name: 'fix_bridge_callbacks_total',
    help: 'Completion callbacks by outcome',
    labelNames: ['outcome'] as const,
    registers: [this.registry],
  });

  private readonly notificationsTotal = new Counter({
    name: 'fix_bridge_notifications_total',
    help: 'Ticket notifications by result',
    labelNames: ['notifier', 'result'] as const,
    registers: [this.registry],
  });

  constructor() {
    collectDefaultMetrics({ register: this.registry });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async getMetrics(): Promise<string> {
    return await this.registry.metrics();
  }

  @OnEvent(DISPATCH_ATTEMPT)
  onDispatchAttempt(event: DispatchAttemptEvent): void {
    this.dispatchAttemptsTotal.inc({ executor: event.executor });
  }

  @OnEvent(DISPATCH_RETRY_SCHEDULED)
  onDispatchRetry(event: DispatchRetryEvent): void {
    this.dispatchRetriesTotal.inc({ executor: event.executor, reason: event.reason });
    this.dispatchRetryDelaySeconds.observe({ reason: event.reason }, event.delayMs / 1000);
  }

  @OnEvent(DISPATCH_SUCCEEDED)
  onDispatchSucceeded(event: DispatchSucceededEvent): void {
    this.dispatchStartedTotal.inc({
      executor: event.executor,
      used_fallback: String(event.usedFallback),
    });
  }

  @OnEvent(DISPATCH_FALLBACK)
  onDispatchFallback(event: DispatchFallbackEvent): void {
    this.dispatchFallbackTotal.inc({ from: event.from, to: event.to, reason: event.reason });
  }

  @OnEvent(DISPATCH_FAILED)
  onDispatchFailed(event: DispatchFailedEvent): void {
    this.dispatchFailedTotal.inc({
      primary_kind: event.primaryKind,
      fallback_kind: event.fallbackKind ?? 'none',
    });
  }

  @OnEvent(DISPATCH_CANCELLED)
  onDispatchCancelled(): void {
    this.dispatchCancelledTotal.inc();
  }

  @OnEvent(RUN_CREATED)
  onRunCreated(): void {
    this.runsCreatedTotal.inc();
  }

  @OnEvent(RUN_STATUS_CHANGED)
  onRunStatusChanged(event: RunStatusChangedEvent): void {
    if (!isTerminal(event.to)) {
      return;
    }
    this.runsFinishedTotal.inc({ status: event.to, used_fallback: String(event.usedFallback) });
    this.runDurationSeconds.observe({ status: event.to }, event.durationMs / 1000);
  }

  @OnEvent(CIRCUIT_STATE_CHANGED)
  onCircuitStateChanged(event: CircuitStateChange): void {
    const open = event.to === CircuitState.OPEN ? 1 : 0;
    this.circuitOpen.set({ dependency: event.dependency }, open);
    this.circuitTransitionsTotal.inc({ dependency: event.dependency, to: event.to });
    this.logger.debug(
      `Circuit state changed for ${event.dependency}: ${event.from} -> ${event.to}`,
    );
  }

  @OnEvent(CALLBACK_RECEIVED)
  onCallbackReceived(event: CallbackReceivedEvent): void {
    this.callbacksTotal.inc({ outcome: event.outcome });
  }

  @OnEvent(NOTIFICATION_SENT)
  onNotificationSent(event: NotificationEvent): void {
    this.notificationsTotal.inc({ notifier: event.notifier, result: 'sent' });
  }

  @OnEvent(NOTIFICATION_FAILED)
  onNotificationFailed(event: NotificationEvent): void {
    this.notificationsTotal.inc({ notifier: event.notifier, result: 'failed' });
  }
}
