/**
 * Jira Webhook Controller
 *
 * Endpoints:
 * - POST /api/v1/webhooks/jira  Start a fix run for an issue carrying the trigger label
 */

import {
  Body,
  Controller,
  GatewayTimeoutException,
  HttpStatus,
  Logger,
  Post,
  Res,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Response } from 'express';
import { toHttpException } from '../common/http-errors';
import { requestSignal } from '../common/request-signal';
import { JiraSettings, loadJiraSettings, ticketUrl } from '../notifications/jira.config';
import { CancellationError } from '../resilience/resilience.errors';
import { loadDispatchSettings } from './dispatch.config';
import { JiraWebhookDto } from './dto/jira-webhook.dto';
import { evaluateJiraWebhook } from './jira-issue';
import { TaskDispatcherService } from './task-dispatcher.service';

@Controller('webhooks/jira')
export class JiraWebhookController {
  private readonly logger = new Logger(JiraWebhookController.name);
  private readonly jira: JiraSettings;
  private readonly deadlineMs: number;

  constructor(
    private readonly dispatcher: TaskDispatcherService,
    private readonly configService: ConfigService,
  ) {
    this.jira = loadJiraSettings(this.configService);
    this.deadlineMs = loadDispatchSettings(this.configService).deadlineMs;
  }

  @Post()
  async handle(@Body() payload: JiraWebhookDto, @Res({ passthrough: true }) res: Response) {
    this.logger.log(`Received Jira webhook: ${payload.webhookEvent ?? '(no event)'}`);

    const decision = evaluateJiraWebhook(payload, this.jira.triggerLabel);
    if (!decision.accepted) {
      this.logger.log(`Ignoring webhook: ${decision.reason}`);
      res.status(HttpStatus.OK);
      return { status: 'ignored', reason: decision.reason };
    }

    const { signal, timedOut, dispose } = requestSignal(res, this.deadlineMs);
    try {
      const run = await this.dispatcher.dispatch(
        {
          correlationKey: decision.issueKey,
          summary: decision.summary,
          description: decision.description,
          ticketUrl: ticketUrl(this.jira, decision.issueKey),
        },
        { signal },
      );

      res.status(HttpStatus.ACCEPTED);
      return {
        status: 'accepted',
        runId: run.runId,
        runStatus: run.status,
        usedFallback: run.usedFallback,
      };
    } catch (error) {
      if (error instanceof CancellationError && timedOut()) {
        throw new GatewayTimeoutException(
          `Dispatch for ${decision.issueKey} did not finish: ${error.message}`,
        );
      }
      throw toHttpException(error);
    } finally {
      dispose();
    }
  }
}
