/**
 * Dispatch Health Indicators
 *
 * - circuits: down only when every configured dispatch path has an OPEN
 *   breaker, since any closed path can still start a run
 * - configuration: which remotes are usable; informational, always up
 */

import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { isJiraConfigured, loadJiraSettings } from '../notifications/jira.config';
import { RemoteSettings } from '../remote/remote.config';
import { REMOTE_SETTINGS } from '../remote/remote.module';
import {
  FALLBACK_TASK_CLIENT,
  PRIMARY_TASK_CLIENT,
  RemoteTaskClient,
} from '../remote/remote-task-client';
import { CircuitState } from '../resilience/circuit-breaker';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.registry';

@Injectable()
export class DispatchHealthIndicator extends HealthIndicator {
  constructor(
    private readonly breakers: CircuitBreakerRegistry,
    private readonly configService: ConfigService,
    @Inject(REMOTE_SETTINGS) private readonly settings: RemoteSettings,
    @Inject(PRIMARY_TASK_CLIENT) private readonly primary: RemoteTaskClient,
    @Inject(FALLBACK_TASK_CLIENT) private readonly fallback: RemoteTaskClient | null,
  ) {
    super();
  }

  async checkCircuits(key: string): Promise<HealthIndicatorResult> {
    const paths = this.fallback ? [this.primary, this.fallback] : [this.primary];
    const dispatchStates = paths.map((client) => this.breakers.get(client.name).getSnapshot());
    const isHealthy = dispatchStates.some((snapshot) => snapshot.state !== CircuitState.OPEN);

    const breakers = Object.fromEntries(
      this.breakers.snapshots().map((snapshot) => [
        snapshot.dependency,
        {
          state: snapshot.state,
          failureCount: snapshot.failureCount,
          lastFailureAt: snapshot.lastFailureAt?.toISOString() ?? null,
        },
      ]),
    );
    const result = this.getStatus(key, isHealthy, {
      dispatchPaths: paths.map((client) => client.name),
      breakers,
    });

    if (isHealthy) {
      return result;
    }
    throw new HealthCheckError('Every dispatch path has an open circuit', result);
  }

  async checkConfiguration(key: string): Promise<HealthIndicatorResult> {
    const jira = loadJiraSettings(this.configService);

    return this.getStatus(key, true, {
      primaryExecutor: this.settings.primaryExecutor,
      fallback: this.describeFallback(),
      callbackUrlConfigured: Boolean(this.settings.callbackUrl),
      ticketNotifications: isJiraConfigured(jira) ? 'jira' : 'log',
      triggerLabel: jira.triggerLabel,
    });
  }

  private describeFallback(): string {
    if (this.fallback) {
      return `${this.fallback.name} (${this.settings.githubRepo ?? 'unknown repository'})`;
    }
    return this.settings.fallbackEnabled ? 'enabled but not configured' : 'disabled';
  }
}
