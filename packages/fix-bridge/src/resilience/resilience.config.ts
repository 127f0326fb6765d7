import { ConfigService } from '@nestjs/config';
import { BackoffPolicy } from './backoff-executor';
import { isRateLimited, isTransientFailure, retryAfterMs } from './error-classification';

export interface ResilienceSettings {
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  rateLimitMaxWaits: number;
  rateLimitMaxDelayMs: number;
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export function readNumber(configService: ConfigService, key: string, fallback: string): number {
  const raw = configService.get<string>(key, fallback);
  const value = parseFloat(String(raw));
  if (isNaN(value) || value < 0) {
    throw new Error(`Invalid ${key}: expected a non-negative number, got "${raw}"`);
  }
  return value;
}

export function loadResilienceSettings(configService: ConfigService): ResilienceSettings {
  return {
    maxRetries: Math.floor(readNumber(configService, 'DISPATCH_MAX_RETRIES', '3')),
    initialDelayMs: readNumber(configService, 'DISPATCH_INITIAL_DELAY_MS', '1000'),
    backoffFactor: readNumber(configService, 'DISPATCH_BACKOFF_FACTOR', '2'),
    maxDelayMs: readNumber(configService, 'DISPATCH_MAX_DELAY_MS', '60000'),
    rateLimitMaxWaits: Math.floor(
      readNumber(configService, 'DISPATCH_RATE_LIMIT_MAX_WAITS', '2'),
    ),
    rateLimitMaxDelayMs: readNumber(configService, 'DISPATCH_RATE_LIMIT_MAX_DELAY_MS', '60000'),
    failureThreshold: Math.max(
      1,
      Math.floor(readNumber(configService, 'CIRCUIT_BREAKER_FAILURE_THRESHOLD', '5')),
    ),
    recoveryTimeoutMs: readNumber(configService, 'CIRCUIT_BREAKER_RECOVERY_TIMEOUT_MS', '60000'),
  };
}

export function buildBackoffPolicy(settings: ResilienceSettings): BackoffPolicy {
  return {
    maxRetries: settings.maxRetries,
    initialDelayMs: settings.initialDelayMs,
    backoffFactor: settings.backoffFactor,
    maxDelayMs: settings.maxDelayMs,
    isRetryable: isTransientFailure,
    rateLimit: {
      maxWaits: settings.rateLimitMaxWaits,
      maxDelayMs: settings.rateLimitMaxDelayMs,
      isRateLimited,
      retryAfterMs,
    },
  };
}
