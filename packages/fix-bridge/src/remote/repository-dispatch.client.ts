/**
 * Repository Dispatch Client
 *
 * Fallback path: fires a GitHub `repository_dispatch` event that starts the
 * fix workflow in CI. GitHub answers 204 with no body, so there is no remote
 * task id, no status and no cancellation; the run completes when the
 * workflow opens its pull request.
 */

import { Logger } from '@nestjs/common';
import { RemoteHttp } from './remote-http';
import { FixTaskRequest, RemoteTaskClient, RemoteTaskHandle } from './remote-task-client';

export const REPOSITORY_DISPATCH_EVENT_TYPE = 'copilot-fix';

export class RepositoryDispatchClient implements RemoteTaskClient {
  readonly name = 'repository-dispatch';
  private readonly logger = new Logger(RepositoryDispatchClient.name);

  constructor(
    private readonly http: RemoteHttp,
    private readonly repository: string,
  ) {}

  async createTask(request: FixTaskRequest, signal?: AbortSignal): Promise<RemoteTaskHandle> {
    const repository = request.repository ?? this.repository;

    this.logger.log(`Triggering ${repository} workflow for ${request.correlationKey}`);

    await this.http.request(
      {
        method: 'post',
        url: `/repos/${repository}/dispatches`,
        data: {
          event_type: REPOSITORY_DISPATCH_EVENT_TYPE,
          client_payload: {
            ticket_id: request.correlationKey,
            ticket_summary: request.summary,
            ticket_description: request.description,
            jira_url: request.ticketUrl,
            run_id: request.runId,
            branch_base: request.baseBranch,
          },
        },
      },
      [204],
      signal,
    );

    return {};
  }

  async getTaskStatus(): Promise<null> {
    return null;
  }

  async cancelTask(externalRef: string): Promise<boolean> {
    this.logger.warn(`Cannot cancel ${externalRef}: repository dispatch has no cancellation`);
    return false;
  }
}
