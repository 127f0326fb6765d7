import {
  BadGatewayException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { DispatchFailedError } from '../dispatch/dispatch.errors';
import { NotificationFailedError } from '../notifications/run-notification.service';
import { CancellationError } from '../resilience/resilience.errors';
import { DuplicateRunError, InvalidTransitionError, UnknownRunError } from '../runs/runs.errors';

/**
 * Map domain errors to their HTTP form; anything else is returned unchanged
 * and ends up as a 500.
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof UnknownRunError) {
    return new NotFoundException({ message: error.message, runId: error.runId });
  }

  if (error instanceof InvalidTransitionError) {
    return new ConflictException({
      message: error.message,
      runId: error.runId,
      currentStatus: error.from,
      requestedStatus: error.to,
    });
  }

  if (error instanceof DuplicateRunError) {
    return new ConflictException({ message: error.message, runId: error.runId });
  }

  if (error instanceof CancellationError) {
    return new ConflictException({ message: error.message, status: 'CANCELLED' });
  }

  if (error instanceof DispatchFailedError) {
    return new BadGatewayException({
      message: error.message,
      runId: error.runId,
      status: 'FAILED',
      primaryError: error.primaryError.message,
      fallbackError: error.fallbackError?.message ?? null,
    });
  }

  if (error instanceof NotificationFailedError) {
    return new BadGatewayException({
      message: error.message,
      runId: error.runId,
      correlationKey: error.correlationKey,
    });
  }

  return error;
}
