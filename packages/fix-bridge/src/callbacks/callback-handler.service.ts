/**
 * Callback Handler Service
 *
 * Applies an asynchronous completion report to its run:
 * - unknown run: UnknownRunError, nothing is created
 * - same terminal status already recorded: duplicate delivery, no side effects
 * - any other illegal move: InvalidTransitionError, run untouched
 * - new terminal state: recorded, then the ticket is notified exactly once
 *
 * Notification failures surface as NotificationFailedError; the terminal
 * state stays recorded.
 */

import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { RunNotificationService } from '../notifications/run-notification.service';
import { branchNameFor } from '../remote/remote-task-client';
import { RunRegistryService } from '../runs/run-registry.service';
import { Run, RunOutcome, RunResult, RunStatus } from '../runs/run.types';
import { InvalidTransitionError, UnknownRunError } from '../runs/runs.errors';
import { ReportedStatus } from './dto/agent-callback.dto';

export const CALLBACK_RECEIVED = 'callback.received';

export interface CallbackReport {
  result?: RunResult;
  errorMessage?: string;
}

export interface CallbackOutcome {
  run: Run;
  duplicate: boolean;
}

export interface PullRequestOpened {
  prUrl?: string;
  prNumber?: number;
  branchName?: string;
  title?: string;
}

export type PullRequestOutcome =
  | ({ matched: true } & CallbackOutcome)
  | { matched: false; reason: string };

const BRANCH_PREFIX = branchNameFor('');

@Injectable()
export class CallbackHandlerService {
  private readonly logger = new Logger(CallbackHandlerService.name);

  constructor(
    private readonly registry: RunRegistryService,
    private readonly notifications: RunNotificationService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async handle(
    reference: string,
    reportedStatus: ReportedStatus,
    report: CallbackReport = {},
  ): Promise<CallbackOutcome> {
    let run: Run;
    try {
      run = await this.registry.resolve(reference);
    } catch (error) {
      if (error instanceof UnknownRunError) {
        this.logger.warn(`Callback for unknown run ${reference} rejected`);
        this.eventEmitter.emit(CALLBACK_RECEIVED, { outcome: 'unknown-run' });
      }
      throw error;
    }

    let target: { status: RunStatus; outcome: RunOutcome };
    let transition: { run: Run; changed: boolean };
    try {
      target = this.toTerminal(run, reportedStatus, report);
      transition = await this.registry.transition(run.runId, target.status, target.outcome);
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        this.logger.warn(`Callback for run ${run.runId} rejected: ${error.message}`);
        this.eventEmitter.emit(CALLBACK_RECEIVED, { outcome: 'invalid-transition' });
      }
      throw error;
    }

    if (!transition.changed) {
      this.logger.log(`Duplicate ${reportedStatus} callback for run ${run.runId} ignored`);
      this.eventEmitter.emit(CALLBACK_RECEIVED, { outcome: 'duplicate' });
      return { run: transition.run, duplicate: true };
    }

    this.logger.log(`Run ${run.runId} (${run.correlationKey}) finished: ${target.status}`);
    this.eventEmitter.emit(CALLBACK_RECEIVED, { outcome: 'applied', status: target.status });

    await this.notifications.notifyTerminal(transition.run);
    return { run: transition.run, duplicate: false };
  }

  /**
   * Complete the newest running run for the ticket named by a `fix/<key>`
   * branch. Runs started through repository dispatch finish this way.
   */
  async handlePullRequestOpened(pr: PullRequestOpened): Promise<PullRequestOutcome> {
    const branch = pr.branchName;
    if (!branch || !branch.startsWith(BRANCH_PREFIX) || branch.length === BRANCH_PREFIX.length) {
      return {
        matched: false,
        reason: `branch ${branch ?? '(none)'} does not match ${BRANCH_PREFIX}<ticket>`,
      };
    }

    const correlationKey = branch.slice(BRANCH_PREFIX.length);
    const runs = await this.registry.listByCorrelationKey(correlationKey);
    const running = runs.filter((run) => run.status === RunStatus.RUNNING).pop();
    if (!running) {
      return { matched: false, reason: `no running run for ${correlationKey}` };
    }

    this.logger.log(`Pull request ${pr.prUrl ?? '(no url)'} completes run ${running.runId}`);
    const outcome = await this.handle(running.runId, 'completed', {
      result: {
        prUrl: pr.prUrl,
        prNumber: pr.prNumber,
        branchName: branch,
        analysis: pr.title,
      },
    });
    return { matched: true, ...outcome };
  }

  private toTerminal(
    run: Run,
    reported: ReportedStatus,
    report: CallbackReport,
  ): { status: RunStatus; outcome: RunOutcome } {
    switch (reported) {
      case 'completed':
        return { status: RunStatus.COMPLETED, outcome: { result: report.result ?? {} } };
      case 'failed':
        return {
          status: RunStatus.FAILED,
          outcome: {
            error: {
              code: 'AGENT_FAILED',
              message: report.errorMessage ?? 'Agent reported failure without a reason',
            },
          },
        };
      case 'timeout':
        return {
          status: RunStatus.FAILED,
          outcome: {
            error: {
              code: 'TIMEOUT',
              message: report.errorMessage ?? 'Agent run timed out',
            },
          },
        };
      case 'cancelled':
        return {
          status: RunStatus.CANCELLED,
          outcome: { cancelReason: report.errorMessage ?? 'Cancelled by the agent' },
        };
      default:
        // pending/running are progress reports, never a completion
        throw new InvalidTransitionError(run.runId, run.status, reported);
    }
  }
}
