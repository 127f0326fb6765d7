/**
 * Circuit Breaker Registry
 *
 * One breaker per remote dependency, created lazily on first use.
 * Breakers never share state; state changes are published on the event bus
 * for metrics and health reporting. Local bulkhead rejections are not
 * counted against the remote.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  CircuitBreaker,
  CircuitBreakerSnapshot,
  CircuitStateChange,
} from './circuit-breaker';
import { isDependencyFailure } from './error-classification';
import { loadResilienceSettings } from './resilience.config';

export const CIRCUIT_STATE_CHANGED = 'circuit.state-changed';

@Injectable()
export class CircuitBreakerRegistry {
  private readonly logger = new Logger(CircuitBreakerRegistry.name);
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    const settings = loadResilienceSettings(this.configService);
    this.failureThreshold = settings.failureThreshold;
    this.recoveryTimeoutMs = settings.recoveryTimeoutMs;
  }

  get(dependency: string): CircuitBreaker {
    let breaker = this.breakers.get(dependency);
    if (!breaker) {
      breaker = new CircuitBreaker(dependency, {
        failureThreshold: this.failureThreshold,
        recoveryTimeoutMs: this.recoveryTimeoutMs,
        isCounted: isDependencyFailure,
        onStateChange: (change: CircuitStateChange) => {
          this.eventEmitter.emit(CIRCUIT_STATE_CHANGED, change);
        },
      });
      this.breakers.set(dependency, breaker);
    }
    return breaker;
  }

  snapshots(): CircuitBreakerSnapshot[] {
    return [...this.breakers.values()].map((breaker) => breaker.getSnapshot());
  }

  async reset(dependency: string): Promise<boolean> {
    const breaker = this.breakers.get(dependency);
    if (!breaker) {
      return false;
    }
    await breaker.reset();
    this.logger.log(`Circuit breaker reset for ${dependency}`);
    return true;
  }
}
