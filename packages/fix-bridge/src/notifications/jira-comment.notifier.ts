/**
 * Jira Comment Notifier
 *
 * Posts the run outcome as a comment on the originating issue:
 * POST /rest/api/3/issue/{key}/comment with basic auth (email + API token).
 * Calls go through the `jira` circuit breaker, single attempt.
 */

import { Logger } from '@nestjs/common';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { RemoteHttp } from '../remote/remote-http';
import { Run } from '../runs/run.types';
import { buildRunComment } from './ticket-comment';
import { TicketNotifier } from './ticket-notifier';

export class JiraCommentNotifier extends TicketNotifier {
  readonly name = 'jira';
  private readonly logger = new Logger(JiraCommentNotifier.name);

  constructor(
    private readonly http: RemoteHttp,
    private readonly breaker: CircuitBreaker,
  ) {
    super();
  }

  async notify(run: Run): Promise<void> {
    const issueKey = encodeURIComponent(run.correlationKey);

    await this.breaker.execute(() =>
      this.http.request(
        {
          method: 'post',
          url: `/rest/api/3/issue/${issueKey}/comment`,
          data: { body: buildRunComment(run) },
        },
        [200, 201],
      ),
    );

    this.logger.log(`Posted ${run.status} comment to ${run.correlationKey} for run ${run.runId}`);
  }
}
