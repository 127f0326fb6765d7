/**
 * Agent API Client
 *
 * Starts fix tasks on the hosted coding-agent service:
 * - POST /v1/agents/runs             create (201)
 * - GET  /v1/agents/runs/:id         status (200)
 * - POST /v1/agents/runs/:id/cancel  cancel (200)
 *
 * Completion is reported asynchronously to the configured callback URL.
 */

import { Logger } from '@nestjs/common';
import { RemoteCallError } from '../resilience/resilience.errors';
import { RemoteHttp } from './remote-http';
import {
  FixTaskRequest,
  RemoteTaskClient,
  RemoteTaskHandle,
  RemoteTaskStatus,
  branchNameFor,
} from './remote-task-client';

export interface AgentApiSettings {
  agentId?: string;
  callbackUrl?: string;
  defaultRepository?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && isFinite(value) ? value : undefined;
}

export class AgentApiClient implements RemoteTaskClient {
  readonly name = 'agent-api';
  private readonly logger = new Logger(AgentApiClient.name);

  constructor(
    private readonly http: RemoteHttp,
    private readonly settings: AgentApiSettings,
  ) {}

  async createTask(request: FixTaskRequest, signal?: AbortSignal): Promise<RemoteTaskHandle> {
    const payload = {
      agent_id: this.settings.agentId,
      input: {
        task_type: 'jira_fix',
        ticket_id: request.correlationKey,
        ticket_summary: request.summary,
        ticket_description: request.description,
        jira_url: request.ticketUrl,
        repository: request.repository ?? this.settings.defaultRepository,
        branch_base: request.baseBranch,
        branch_name: branchNameFor(request.correlationKey),
      },
      webhook_url: this.settings.callbackUrl,
      metadata: {
        source: 'jira_webhook',
        ticket_id: request.correlationKey,
        bridge_run_id: request.runId,
      },
    };

    this.logger.log(`Creating agent run for ${request.correlationKey} (run ${request.runId})`);

    const response = await this.http.request<unknown>(
      { method: 'post', url: '/v1/agents/runs', data: payload },
      [201],
      signal,
    );

    const body = response.data;
    const externalRef = isRecord(body) ? optionalString(body.run_id) : undefined;
    if (!externalRef) {
      throw new RemoteCallError('Agent API accepted the run but returned no run_id', {
        dependency: this.http.dependency,
        code: 'EBADRESPONSE',
        responseBody: body,
      });
    }

    this.logger.log(`Agent run created: ${externalRef}`);
    return {
      externalRef,
      remoteStatus: isRecord(body) ? optionalString(body.status) : undefined,
    };
  }

  async getTaskStatus(externalRef: string, signal?: AbortSignal): Promise<RemoteTaskStatus> {
    const response = await this.http.request<unknown>(
      { method: 'get', url: `/v1/agents/runs/${encodeURIComponent(externalRef)}` },
      [200],
      signal,
    );

    const body = response.data;
    const status = isRecord(body) ? optionalString(body.status) : undefined;
    if (!isRecord(body) || !status) {
      throw new RemoteCallError(`Agent API returned no status for ${externalRef}`, {
        dependency: this.http.dependency,
        code: 'EBADRESPONSE',
        responseBody: body,
      });
    }

    return {
      externalRef,
      status,
      progress: optionalNumber(body.progress),
      currentStep: optionalString(body.current_step),
      errorMessage: optionalString(body.error_message),
    };
  }

  async cancelTask(externalRef: string, signal?: AbortSignal): Promise<boolean> {
    // 404/409: the run is gone or already finished
    const response = await this.http.request<unknown>(
      { method: 'post', url: `/v1/agents/runs/${encodeURIComponent(externalRef)}/cancel` },
      [200, 202, 404, 409],
      signal,
    );

    const cancelled = response.status === 200 || response.status === 202;
    if (cancelled) {
      this.logger.log(`Agent run ${externalRef} cancelled`);
    } else {
      this.logger.warn(`Agent run ${externalRef} not cancelled (HTTP ${response.status})`);
    }
    return cancelled;
  }
}
