import { ConfigService } from '@nestjs/config';
import { readNumber } from '../resilience/resilience.config';

export interface DispatchSettings {
  // Time a dispatch request may take before it is cancelled with a 504
  deadlineMs: number;
}

export function loadDispatchSettings(configService: ConfigService): DispatchSettings {
  const deadlineMs = readNumber(configService, 'DISPATCH_DEADLINE_MS', '120000');
  if (deadlineMs === 0) {
    throw new Error('Invalid DISPATCH_DEADLINE_MS: expected a positive number, got "0"');
  }
  return { deadlineMs };
}
