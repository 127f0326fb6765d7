/**
 * Callbacks Controller
 *
 * Endpoints:
 * - POST /api/v1/webhooks/agent-callback  Completion report from the coding agent
 * - POST /api/v1/webhooks/github-pr       Pull request events from the fallback workflow
 */

import { Body, Controller, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { toHttpException } from '../common/http-errors';
import { CallbackHandlerService } from './callback-handler.service';
import { AgentCallbackDto } from './dto/agent-callback.dto';
import { GitHubPullRequestWebhookDto } from './dto/github-pull-request.dto';

@Controller('webhooks')
export class CallbacksController {
  private readonly logger = new Logger(CallbacksController.name);

  constructor(private readonly callbackHandler: CallbackHandlerService) {}

  @Post('agent-callback')
  @HttpCode(HttpStatus.OK)
  async agentCallback(@Body() body: AgentCallbackDto) {
    this.logger.log(`Agent callback: run=${body.run_id} status=${body.status}`);

    try {
      const { run, duplicate } = await this.callbackHandler.handle(body.run_id, body.status, {
        errorMessage: body.error_message,
        result: {
          prUrl: body.pr_url,
          prNumber: body.pr_number,
          branchName: body.branch_name,
          commitSha: body.commit_sha,
          filesChanged: body.files_changed,
          analysis: body.agent_analysis,
        },
      });
      return { status: 'ok', runId: run.runId, runStatus: run.status, duplicate };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('github-pr')
  @HttpCode(HttpStatus.OK)
  async githubPullRequest(@Body() body: GitHubPullRequestWebhookDto) {
    if (body.action !== 'opened') {
      return { status: 'ignored', reason: `action is ${body.action ?? '(none)'}, not opened` };
    }

    const pr = body.pull_request;
    try {
      const outcome = await this.callbackHandler.handlePullRequestOpened({
        prUrl: pr?.html_url,
        prNumber: pr?.number,
        branchName: pr?.head?.ref,
        title: pr?.title,
      });

      if (!outcome.matched) {
        this.logger.log(`Ignoring pull request webhook: ${outcome.reason}`);
        return { status: 'ignored', reason: outcome.reason };
      }
      return { status: 'ok', runId: outcome.run.runId, duplicate: outcome.duplicate };
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
