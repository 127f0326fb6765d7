/**
 * Run Registry Service
 *
 * Tracks every dispatched fix task from creation to its terminal state.
 *
 * Key features:
 * - Forward-only lifecycle: CREATED -> RUNNING -> COMPLETED | FAILED | CANCELLED
 * - Idempotent terminal transitions (repeated delivery of the same outcome)
 * - Per-run mutex, so transitions on different runs never contend
 * - Lifecycle events for metrics
 */

import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { createId } from '@paralleldrive/cuid2';
import { Mutex } from 'async-mutex';
import { RunStore } from './run-store';
import {
  DispatchMetadata,
  Run,
  RunOutcome,
  RunStatus,
  TransitionResult,
  isForwardTransition,
  isTerminal,
} from './run.types';
import { InvalidTransitionError, UnknownRunError } from './runs.errors';

export const RUN_CREATED = 'run.created';
export const RUN_STATUS_CHANGED = 'run.status-changed';

export interface RunStatusChangedEvent {
  runId: string;
  correlationKey: string;
  from: RunStatus;
  to: RunStatus;
  usedFallback: boolean;
  durationMs: number;
}

@Injectable()
export class RunRegistryService {
  private readonly logger = new Logger(RunRegistryService.name);
  private readonly locks = new Map<string, Mutex>();

  constructor(
    private readonly store: RunStore,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async create(correlationKey: string, runId: string = `run_${createId()}`): Promise<Run> {
    const now = new Date();
    const run: Run = {
      runId,
      correlationKey,
      status: RunStatus.CREATED,
      createdAt: now,
      updatedAt: now,
      attemptCount: 0,
      usedFallback: false,
    };

    await this.store.insert(run);

    this.logger.log(`Run ${runId} created for ${correlationKey}`);
    this.eventEmitter.emit(RUN_CREATED, { runId, correlationKey });

    return run;
  }

  async get(runId: string): Promise<Run> {
    const run = await this.store.findById(runId);
    if (!run) {
      throw new UnknownRunError(runId);
    }
    return run;
  }

  find(runId: string): Promise<Run | undefined> {
    return this.store.findById(runId);
  }

  /**
   * Look a run up by its own id or by the remote task id it was started with
   */
  async resolve(reference: string): Promise<Run> {
    const run =
      (await this.store.findById(reference)) ?? (await this.store.findByExternalRef(reference));
    if (!run) {
      throw new UnknownRunError(reference);
    }
    return run;
  }

  listByCorrelationKey(correlationKey: string): Promise<Run[]> {
    return this.store.findByCorrelationKey(correlationKey);
  }

  /**
   * CREATED -> RUNNING, recording which path accepted the task
   */
  async markStarted(runId: string, metadata: DispatchMetadata): Promise<Run> {
    return this.withLock(runId, async () => {
      const run = await this.get(runId);
      if (run.status !== RunStatus.CREATED) {
        throw new InvalidTransitionError(runId, run.status, RunStatus.RUNNING);
      }

      const next: Run = {
        ...run,
        status: RunStatus.RUNNING,
        updatedAt: new Date(),
        attemptCount: metadata.attemptCount,
        usedFallback: metadata.usedFallback,
        executor: metadata.executor,
        externalRef: metadata.externalRef,
      };

      await this.commit(run, next);
      return next;
    });
  }

  async transition(
    runId: string,
    status: RunStatus,
    outcome: RunOutcome = {},
    metadata: Partial<DispatchMetadata> = {},
  ): Promise<TransitionResult> {
    return this.withLock(runId, async () => {
      const run = await this.get(runId);

      if (run.status === status && isTerminal(status)) {
        this.logger.debug(`Run ${runId} already ${status}, ignoring repeated transition`);
        return { run, changed: false };
      }

      if (!isForwardTransition(run.status, status)) {
        throw new InvalidTransitionError(runId, run.status, status);
      }

      const next: Run = {
        ...run,
        ...metadata,
        status,
        updatedAt: new Date(),
        result: status === RunStatus.COMPLETED ? outcome.result : undefined,
        error: status === RunStatus.FAILED ? outcome.error : undefined,
        cancelReason: status === RunStatus.CANCELLED ? outcome.cancelReason : undefined,
      };

      await this.commit(run, next);
      return { run: next, changed: true };
    });
  }

  private async commit(previous: Run, next: Run): Promise<void> {
    const applied = await this.store.replace(next, previous.status);
    if (!applied) {
      // Another writer moved the run on behind our back
      const current = await this.get(previous.runId);
      throw new InvalidTransitionError(previous.runId, current.status, next.status);
    }

    this.logger.log(`Run ${next.runId}: ${previous.status} -> ${next.status}`);

    const event: RunStatusChangedEvent = {
      runId: next.runId,
      correlationKey: next.correlationKey,
      from: previous.status,
      to: next.status,
      usedFallback: next.usedFallback,
      durationMs: next.updatedAt.getTime() - next.createdAt.getTime(),
    };
    this.eventEmitter.emit(RUN_STATUS_CHANGED, event);
  }

  private async withLock<T>(runId: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(runId);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(runId, lock);
    }
    const held = lock;

    try {
      return await held.runExclusive(fn);
    } finally {
      if (!held.isLocked() && this.locks.get(runId) === held) {
        this.locks.delete(runId);
      }
    }
  }
}
