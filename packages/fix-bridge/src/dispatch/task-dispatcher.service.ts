/**
 * Task Dispatcher Service
 *
 * Starts a fix task for a ticket and records it as a run:
 * 1. create the run (CREATED)
 * 2. primary client through its circuit breaker, wrapped in backoff
 * 3. on any primary failure, one attempt on the fallback client through
 *    its own breaker
 * 4. RUNNING on success, FAILED (DispatchFailedError) when every path failed,
 *    CANCELLED (CancellationError) when the caller or cancel() gave up;
 *    a run a callback finished first is returned as recorded
 *
 * Also cancels runs and reports their status, asking the accepting client
 * where it supports it.
 */

import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  NotificationFailedError,
  RunNotificationService,
} from '../notifications/run-notification.service';
import { BackoffEvent, BackoffPolicy, executeWithBackoff } from '../resilience/backoff-executor';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.registry';
import {
  FailureDescription,
  FailureKind,
  classifyFailure,
  describeFailure,
} from '../resilience/error-classification';
import { buildBackoffPolicy, loadResilienceSettings } from '../resilience/resilience.config';
import { CancellationError, abortReason } from '../resilience/resilience.errors';
import {
  FALLBACK_TASK_CLIENT,
  FixTaskRequest,
  PRIMARY_TASK_CLIENT,
  RemoteTaskClient,
  RemoteTaskHandle,
  RemoteTaskStatus,
} from '../remote/remote-task-client';
import { RunRegistryService } from '../runs/run-registry.service';
import { Run, RunStatus, isTerminal } from '../runs/run.types';
import { DispatchFailedError } from './dispatch.errors';

export const DISPATCH_ATTEMPT = 'dispatch.attempt';
export const DISPATCH_RETRY_SCHEDULED = 'dispatch.retry-scheduled';
export const DISPATCH_SUCCEEDED = 'dispatch.succeeded';
export const DISPATCH_FALLBACK = 'dispatch.fallback';
export const DISPATCH_FAILED = 'dispatch.failed';
export const DISPATCH_CANCELLED = 'dispatch.cancelled';

export interface DispatchRequest {
  correlationKey: string;
  summary: string;
  description: string;
  ticketUrl?: string;
  repository?: string;
  baseBranch?: string;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface RunStatusView {
  run: Run;
  // Live view from the accepting client, when it can report one
  remote: RemoteTaskStatus | null;
}

@Injectable()
export class TaskDispatcherService implements OnApplicationShutdown {
  private readonly logger = new Logger(TaskDispatcherService.name);
  private readonly backoffPolicy: BackoffPolicy;
  // Dispatches still waiting on a remote, so cancel() can interrupt them
  private readonly inFlight = new Map<string, AbortController>();

  constructor(
    private readonly registry: RunRegistryService,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly notifications: RunNotificationService,
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PRIMARY_TASK_CLIENT) private readonly primary: RemoteTaskClient,
    @Inject(FALLBACK_TASK_CLIENT) private readonly fallback: RemoteTaskClient | null,
  ) {
    this.backoffPolicy = buildBackoffPolicy(loadResilienceSettings(this.configService));
    this.logger.log(
      `Dispatcher ready (primary=${primary.name}, fallback=${fallback?.name ?? 'disabled'})`,
    );
  }

  async dispatch(request: DispatchRequest, options: DispatchOptions = {}): Promise<Run> {
    const run = await this.registry.create(request.correlationKey);
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(options.signal?.reason);

    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }
    this.inFlight.set(run.runId, controller);

    try {
      return await this.startRun(run, this.toTaskRequest(run, request), controller.signal);
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
      this.inFlight.delete(run.runId);
    }
  }

  /**
   * Interrupt dispatches still in flight; each records its run as CANCELLED
   * before its caller's request completes.
   */
  onApplicationShutdown(signal?: string): void {
    if (this.inFlight.size === 0) {
      return;
    }
    this.logger.warn(
      `Shutting down (${signal ?? 'no signal'}): interrupting ${this.inFlight.size} dispatch(es)`,
    );
    for (const controller of this.inFlight.values()) {
      controller.abort(new Error('service shutting down'));
    }
  }

  /**
   * Cancel a run: interrupt its dispatch, ask the remote to stop, record
   * CANCELLED and notify the ticket once.
   */
  async cancel(runId: string, reason = 'Cancelled on request'): Promise<Run> {
    const run = await this.registry.get(runId);
    if (run.status === RunStatus.CANCELLED) {
      return run;
    }

    this.inFlight.get(runId)?.abort(new Error(reason));

    if (run.status === RunStatus.RUNNING && run.externalRef) {
      await this.cancelRemote(run, run.externalRef);
    }

    const { run: cancelled, changed } = await this.registry.transition(runId, RunStatus.CANCELLED, {
      cancelReason: reason,
    });

    if (changed) {
      this.eventEmitter.emit(DISPATCH_CANCELLED, { runId, correlationKey: run.correlationKey });
      await this.notifications.notifyTerminal(cancelled);
    }

    return cancelled;
  }

  async status(runId: string): Promise<RunStatusView> {
    const run = await this.registry.get(runId);
    const client = this.clientFor(run.executor);

    if (run.status !== RunStatus.RUNNING || !run.externalRef || !client) {
      return { run, remote: null };
    }

    const externalRef = run.externalRef;
    try {
      const remote = await this.breakers
        .get(client.name)
        .execute(() => client.getTaskStatus(externalRef));
      return { run, remote };
    } catch (error) {
      this.logger.warn(
        `Could not refresh status of run ${runId} from ${client.name}: ${describeFailure(error).message}`,
      );
      return { run, remote: null };
    }
  }

  private async startRun(run: Run, task: FixTaskRequest, signal: AbortSignal): Promise<Run> {
    let attempts = 0;
    const breaker = this.breakers.get(this.primary.name);

    let handle: RemoteTaskHandle;
    try {
      handle = await executeWithBackoff(
        (attempt, attemptSignal) =>
          breaker.execute(() => {
            // Only attempts the breaker admitted reach the remote
            attempts++;
            this.eventEmitter.emit(DISPATCH_ATTEMPT, {
              runId: run.runId,
              executor: this.primary.name,
              attempt,
            });
            return this.primary.createTask(task, attemptSignal);
          }),
        this.backoffPolicy,
        { signal, onEvent: (event) => this.onBackoffEvent(run, event) },
      );
    } catch (primaryError) {
      if (classifyFailure(primaryError) === FailureKind.CANCELLED) {
        return this.abandon(run, attempts, false, primaryError, signal);
      }
      return this.startOnFallback(run, task, signal, attempts, primaryError);
    }

    return this.started(run, this.primary, handle, attempts, false, signal);
  }

  private async startOnFallback(
    run: Run,
    task: FixTaskRequest,
    signal: AbortSignal,
    attempts: number,
    primaryError: unknown,
  ): Promise<Run> {
    const primaryFailure = describeFailure(primaryError);
    const fallback = this.fallback;

    if (!fallback) {
      this.logger.error(
        `Run ${run.runId}: primary ${this.primary.name} failed (${primaryFailure.kind}) ` +
          `and no fallback is configured: ${primaryFailure.message}`,
      );
      return this.fail(run, attempts, false, primaryFailure);
    }

    this.logger.warn(
      `Run ${run.runId}: primary ${this.primary.name} failed (${primaryFailure.kind}), ` +
        `falling back to ${fallback.name}: ${primaryFailure.message}`,
    );
    this.eventEmitter.emit(DISPATCH_FALLBACK, {
      runId: run.runId,
      from: this.primary.name,
      to: fallback.name,
      reason: primaryFailure.kind,
    });

    let handle: RemoteTaskHandle;
    try {
      if (signal.aborted) {
        throw new CancellationError(abortReason(signal));
      }
      handle = await this.breakers
        .get(fallback.name)
        .execute(() => fallback.createTask(task, signal));
    } catch (fallbackError) {
      if (classifyFailure(fallbackError) === FailureKind.CANCELLED || signal.aborted) {
        return this.abandon(run, attempts, true, fallbackError, signal);
      }
      const fallbackFailure = describeFailure(fallbackError);
      this.logger.error(
        `Run ${run.runId}: fallback ${fallback.name} failed (${fallbackFailure.kind}): ` +
          fallbackFailure.message,
      );
      return this.fail(run, attempts, true, primaryFailure, fallbackFailure);
    }

    return this.started(run, fallback, handle, attempts, true, signal);
  }

  private async started(
    run: Run,
    client: RemoteTaskClient,
    handle: RemoteTaskHandle,
    attempts: number,
    usedFallback: boolean,
    signal: AbortSignal,
  ): Promise<Run> {
    let running: Run;
    try {
      running = await this.registry.markStarted(run.runId, {
        attemptCount: attempts,
        usedFallback,
        executor: client.name,
        externalRef: handle.externalRef,
      });
    } catch (error) {
      const current = await this.registry.get(run.runId);
      const finishedElsewhere =
        isTerminal(current.status) && current.status !== RunStatus.CANCELLED;
      if (!signal.aborted && finishedElsewhere) {
        // A callback already finished the run while the remote call was in flight
        this.logger.log(
          `Run ${run.runId} finished as ${current.status} before ${client.name} acknowledged it`,
        );
        return current;
      }

      // cancel() won the race while the remote call was in flight
      if (handle.externalRef) {
        await this.cancelRemote({ ...run, executor: client.name }, handle.externalRef);
      }
      throw new CancellationError(
        signal.aborted ? abortReason(signal) : describeFailure(error).message,
      );
    }

    this.logger.log(
      `Run ${run.runId} started on ${client.name}` +
        (handle.externalRef ? ` as ${handle.externalRef}` : '') +
        ` after ${attempts} primary attempt(s)`,
    );
    this.eventEmitter.emit(DISPATCH_SUCCEEDED, {
      runId: run.runId,
      executor: client.name,
      usedFallback,
      attempts,
    });
    return running;
  }

  private async fail(
    run: Run,
    attempts: number,
    usedFallback: boolean,
    primaryFailure: FailureDescription,
    fallbackFailure?: FailureDescription,
  ): Promise<never> {
    const error = new DispatchFailedError(run.runId, primaryFailure, fallbackFailure);

    const { run: failed, changed } = await this.registry.transition(
      run.runId,
      RunStatus.FAILED,
      {
        error: {
          code: 'DISPATCH_FAILED',
          message: error.message,
          details: fallbackFailure
            ? { primary: primaryFailure, fallback: fallbackFailure }
            : { primary: primaryFailure },
        },
      },
      { attemptCount: attempts, usedFallback },
    );

    this.eventEmitter.emit(DISPATCH_FAILED, {
      runId: run.runId,
      primaryKind: primaryFailure.kind,
      fallbackKind: fallbackFailure?.kind,
    });

    if (changed) {
      await this.notifyQuietly(failed);
    }
    throw error;
  }

  private async abandon(
    run: Run,
    attempts: number,
    usedFallback: boolean,
    cause: unknown,
    signal: AbortSignal,
  ): Promise<never> {
    const message = signal.aborted ? abortReason(signal) : describeFailure(cause).message;
    this.logger.warn(`Run ${run.runId}: dispatch cancelled (${message})`);

    const { run: cancelled, changed } = await this.registry.transition(
      run.runId,
      RunStatus.CANCELLED,
      { cancelReason: message },
      { attemptCount: attempts, usedFallback },
    );

    if (changed) {
      this.eventEmitter.emit(DISPATCH_CANCELLED, {
        runId: run.runId,
        correlationKey: run.correlationKey,
      });
      await this.notifyQuietly(cancelled);
    }
    throw cause instanceof CancellationError ? cause : new CancellationError(message);
  }

  /**
   * Dispatch outcomes are already reported to the caller; a failed ticket
   * comment must not replace that error.
   */
  private async notifyQuietly(run: Run): Promise<void> {
    try {
      await this.notifications.notifyTerminal(run);
    } catch (error) {
      if (!(error instanceof NotificationFailedError)) {
        throw error;
      }
      this.logger.warn(`Run ${run.runId} is ${run.status} but the ticket was not updated`);
    }
  }

  private async cancelRemote(run: Run, externalRef: string): Promise<void> {
    const client = this.clientFor(run.executor);
    if (!client) {
      return;
    }

    try {
      const cancelled = await this.breakers
        .get(client.name)
        .execute(() => client.cancelTask(externalRef));
      if (!cancelled) {
        this.logger.warn(`${client.name} did not cancel ${externalRef} for run ${run.runId}`);
      }
    } catch (error) {
      this.logger.warn(
        `Remote cancel of ${externalRef} on ${client.name} failed: ${describeFailure(error).message}`,
      );
    }
  }

  private clientFor(executor: string | undefined): RemoteTaskClient | undefined {
    if (executor === this.primary.name) return this.primary;
    if (this.fallback && executor === this.fallback.name) return this.fallback;
    return undefined;
  }

  private toTaskRequest(run: Run, request: DispatchRequest): FixTaskRequest {
    return {
      runId: run.runId,
      correlationKey: request.correlationKey,
      summary: request.summary,
      description: request.description,
      ticketUrl: request.ticketUrl,
      repository: request.repository,
      baseBranch: request.baseBranch ?? 'main',
    };
  }

  private onBackoffEvent(run: Run, event: BackoffEvent): void {
    switch (event.type) {
      case 'wait':
        this.logger.warn(
          `Run ${run.runId}: attempt ${event.attempt} on ${this.primary.name} failed ` +
            `(${describeFailure(event.error).message}), retrying in ${event.delayMs}ms` +
            (event.reason === 'rate-limit' ? ' (rate limited)' : ''),
        );
        this.eventEmitter.emit(DISPATCH_RETRY_SCHEDULED, {
          runId: run.runId,
          executor: this.primary.name,
          delayMs: event.delayMs,
          reason: event.reason,
        });
        break;
      case 'give-up':
        this.logger.warn(
          `Run ${run.runId}: giving up on ${this.primary.name} after ${event.attempt} attempt(s) ` +
            `(${event.reason})`,
        );
        break;
      case 'attempt':
      case 'success':
        break;
    }
  }
}
