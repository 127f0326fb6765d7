import { Logger } from '@nestjs/common';
import { Run } from '../runs/run.types';
import { summarizeRun } from './ticket-comment';
import { TicketNotifier } from './ticket-notifier';

/**
 * Used when no Jira credentials are configured
 */
export class LoggingNotifier extends TicketNotifier {
  readonly name = 'log';
  private readonly logger = new Logger(LoggingNotifier.name);

  async notify(run: Run): Promise<void> {
    this.logger.log(`[${run.correlationKey}] ${summarizeRun(run)} (run ${run.runId})`);
  }
}
