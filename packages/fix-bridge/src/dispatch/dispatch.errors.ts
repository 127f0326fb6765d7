import { FailureDescription } from '../resilience/error-classification';

/**
 * Neither the primary nor (when enabled) the fallback path accepted the task.
 * The run has already been moved to FAILED.
 */
export class DispatchFailedError extends Error {
  constructor(
    readonly runId: string,
    readonly primaryError: FailureDescription,
    readonly fallbackError?: FailureDescription,
  ) {
    super(
      fallbackError
        ? `Dispatch failed for run ${runId}: primary: ${primaryError.message}; ` +
            `fallback: ${fallbackError.message}`
        : `Dispatch failed for run ${runId}: ${primaryError.message}`,
    );
    this.name = 'DispatchFailedError';
  }
}
