import { RunStatus } from './run.types';

export class UnknownRunError extends Error {
  constructor(readonly runId: string) {
    super(`Unknown run: ${runId}`);
    this.name = 'UnknownRunError';
  }
}

export class DuplicateRunError extends Error {
  constructor(readonly runId: string) {
    super(`Run already exists: ${runId}`);
    this.name = 'DuplicateRunError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly runId: string,
    readonly from: RunStatus,
    readonly to: RunStatus | string,
  ) {
    super(`Invalid transition for run ${runId}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}
