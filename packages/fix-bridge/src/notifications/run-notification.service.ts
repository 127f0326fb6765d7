import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Run } from '../runs/run.types';
import { TicketNotifier } from './ticket-notifier';

export const NOTIFICATION_SENT = 'notification.sent';
export const NOTIFICATION_FAILED = 'notification.failed';

export class NotificationFailedError extends Error {
  constructor(
    readonly runId: string,
    readonly correlationKey: string,
    readonly cause: unknown,
  ) {
    super(
      `Failed to notify ${correlationKey} about run ${runId}: ` +
        (cause instanceof Error ? cause.message : String(cause)),
    );
    this.name = 'NotificationFailedError';
  }
}

/**
 * Sends the downstream ticket notification for a terminal run.
 * Callers invoke it only for transitions that actually changed state.
 */
@Injectable()
export class RunNotificationService {
  private readonly logger = new Logger(RunNotificationService.name);

  constructor(
    private readonly notifier: TicketNotifier,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async notifyTerminal(run: Run): Promise<void> {
    try {
      await this.notifier.notify(run);
    } catch (error) {
      this.logger.error(
        `${this.notifier.name} notification for run ${run.runId} failed: ` +
          (error instanceof Error ? error.message : String(error)),
      );
      this.eventEmitter.emit(NOTIFICATION_FAILED, {
        runId: run.runId,
        notifier: this.notifier.name,
      });
      throw new NotificationFailedError(run.runId, run.correlationKey, error);
    }

    this.eventEmitter.emit(NOTIFICATION_SENT, {
      runId: run.runId,
      notifier: this.notifier.name,
      status: run.status,
    });
  }
}
