/**
 * Circuit Breaker
 *
 * Guards a single remote dependency:
 * - CLOSED: calls pass; counted failures accumulate, success resets the count
 * - OPEN: calls fail fast with CircuitOpenError until recoveryTimeoutMs has
 *   elapsed since the last counted failure
 * - HALF_OPEN: one probe call in flight; success closes, counted failure re-opens
 *
 * State is only touched under the breaker's own mutex. The wrapped operation
 * itself runs outside the lock.
 */

import { Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { isTransientFailure } from './error-classification';
import { CircuitOpenError } from './resilience.errors';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitStateChange {
  dependency: string;
  from: CircuitState;
  to: CircuitState;
  failureCount: number;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  recoveryTimeoutMs: number;
  // Which errors count toward the threshold (default: transient failures)
  isCounted?: (error: unknown) => boolean;
  now?: () => number;
  onStateChange?: (change: CircuitStateChange) => void;
}

export interface CircuitBreakerSnapshot {
  dependency: string;
  state: CircuitState;
  failureCount: number;
  lastFailureAt: Date | null;
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export class CircuitBreaker {
  private readonly logger: Logger;
  private readonly mutex = new Mutex();
  private readonly isCounted: (error: unknown) => boolean;
  private readonly now: () => number;

  private state = CircuitState.CLOSED;
  private failureCount = 0;
  private lastFailureAt: number | null = null;
  private probeInFlight = false;

  constructor(
    readonly dependency: string,
    private readonly options: CircuitBreakerOptions,
  ) {
    this.logger = new Logger(`${CircuitBreaker.name}:${dependency}`);
    this.isCounted = options.isCounted ?? isTransientFailure;
    this.now = options.now ?? Date.now;

    this.logger.log(
      `Circuit breaker initialized (threshold=${options.failureThreshold}, ` +
        `recovery=${options.recoveryTimeoutMs}ms)`,
    );
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const isProbe = await this.mutex.runExclusive(() => this.admit());

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      await this.mutex.runExclusive(() => this.recordFailure(error, isProbe));
      throw error;
    }

    await this.mutex.runExclusive(() => this.recordSuccess(isProbe));
    return result;
  }

  getSnapshot(): CircuitBreakerSnapshot {
    return {
      dependency: this.dependency,
      state: this.state,
      failureCount: this.failureCount,
      lastFailureAt: this.lastFailureAt === null ? null : new Date(this.lastFailureAt),
      failureThreshold: this.options.failureThreshold,
      recoveryTimeoutMs: this.options.recoveryTimeoutMs,
    };
  }

  async reset(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.failureCount = 0;
      this.lastFailureAt = null;
      this.probeInFlight = false;
      this.changeState(CircuitState.CLOSED);
      this.logger.log('Circuit breaker manually reset');
    });
  }

  /**
   * Decide whether a call may proceed. Returns true when the call is the
   * half-open probe.
   */
  private admit(): boolean {
    if (this.state === CircuitState.OPEN) {
      const elapsed = this.now() - (this.lastFailureAt ?? 0);
      if (elapsed < this.options.recoveryTimeoutMs) {
        throw new CircuitOpenError(this.dependency, this.options.recoveryTimeoutMs - elapsed);
      }
      this.changeState(CircuitState.HALF_OPEN);
    }

    if (this.state === CircuitState.HALF_OPEN) {
      if (this.probeInFlight) {
        throw new CircuitOpenError(this.dependency, 0);
      }
      this.probeInFlight = true;
      return true;
    }

    return false;
  }

  private recordSuccess(isProbe: boolean): void {
    if (isProbe) {
      this.probeInFlight = false;
      this.failureCount = 0;
      this.changeState(CircuitState.CLOSED);
      return;
    }

    if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }
  }

  private recordFailure(error: unknown, isProbe: boolean): void {
    if (isProbe) {
      this.probeInFlight = false;
    }

    if (!this.isCounted(error)) {
      return;
    }

    if (isProbe) {
      this.failureCount++;
      this.lastFailureAt = this.now();
      this.changeState(CircuitState.OPEN);
      return;
    }

    // A call admitted while CLOSED may finish after the breaker opened
    if (this.state !== CircuitState.CLOSED) {
      return;
    }

    this.failureCount++;
    this.lastFailureAt = this.now();

    this.logger.warn(
      `Failure #${this.failureCount}/${this.options.failureThreshold}: ` +
        (error instanceof Error ? error.message : String(error)),
    );

    if (this.failureCount >= this.options.failureThreshold) {
      this.changeState(CircuitState.OPEN);
    }
  }

  private changeState(next: CircuitState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;

    if (next === CircuitState.OPEN) {
      this.logger.error(
        `Circuit breaker OPEN after ${this.failureCount} failures - ` +
          `rejecting calls for ${this.options.recoveryTimeoutMs}ms`,
      );
    } else {
      this.logger.log(`Circuit breaker ${previous} -> ${next}`);
    }

    this.options.onStateChange?.({
      dependency: this.dependency,
      from: previous,
      to: next,
      failureCount: this.failureCount,
    });
  }
}
