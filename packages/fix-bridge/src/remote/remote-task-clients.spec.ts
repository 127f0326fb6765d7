import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ConfigService } from '@nestjs/config';
import { RemoteCallError } from '../resilience/resilience.errors';
import { AgentApiClient } from './agent-api.client';
import { createFallbackClient, createPrimaryClient } from './remote-client.factory';
import { RemoteHttp } from './remote-http';
import { loadRemoteSettings } from './remote.config';
import { FixTaskRequest } from './remote-task-client';
import { RepositoryDispatchClient } from './repository-dispatch.client';
import { SimulatedAgentClient } from './simulated-agent.client';

describe('remote task clients', () => {
  const request: FixTaskRequest = {
    runId: 'run_abc',
    correlationKey: 'TICK-1',
    summary: 'Null check missing',
    description: 'Crash when the profile is empty',
    ticketUrl: 'https://jira.example.test/browse/TICK-1',
    baseBranch: 'main',
  };

  const makeAdapter = (status: number, data: unknown = undefined) =>
    jest.fn(
      async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
        data,
        status,
        statusText: '',
        headers: {},
        config,
      }),
    );

  const httpFor = (adapter: ReturnType<typeof makeAdapter>, dependency: string) =>
    new RemoteHttp(axios.create({ baseURL: 'http://remote.test', adapter }), {
      dependency,
      timeoutMs: 1000,
      maxConcurrent: 5,
      maxQueue: 5,
    });

  const sentBody = (adapter: ReturnType<typeof makeAdapter>): unknown => {
    const config = adapter.mock.calls[0][0];
    return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
  };

  describe('AgentApiClient', () => {
    const makeClient = (adapter: ReturnType<typeof makeAdapter>) =>
      new AgentApiClient(httpFor(adapter, 'agent-api'), {
        agentId: 'agent-7',
        callbackUrl: 'http://bridge.test/api/v1/webhooks/agent-callback',
        defaultRepository: 'acme/widgets',
      });

    it('creates an agent run and returns its id', async () => {
      const adapter = makeAdapter(201, { run_id: 'agent-run-1', status: 'running' });

      const handle = await makeClient(adapter).createTask(request);

      expect(handle).toEqual({ externalRef: 'agent-run-1', remoteStatus: 'running' });
      const config = adapter.mock.calls[0][0];
      expect(config.method).toBe('post');
      expect(config.url).toBe('/v1/agents/runs');
      expect(sentBody(adapter)).toEqual({
        agent_id: 'agent-7',
        input: {
          task_type: 'jira_fix',
          ticket_id: 'TICK-1',
          ticket_summary: 'Null check missing',
          ticket_description: 'Crash when the profile is empty',
          jira_url: 'https://jira.example.test/browse/TICK-1',
          repository: 'acme/widgets',
          branch_base: 'main',
          branch_name: 'fix/TICK-1',
        },
        webhook_url: 'http://bridge.test/api/v1/webhooks/agent-callback',
        metadata: { source: 'jira_webhook', ticket_id: 'TICK-1', bridge_run_id: 'run_abc' },
      });
    });

    it('rejects an accepted response without a run id as malformed', async () => {
      const adapter = makeAdapter(201, { status: 'running' });

      await expect(makeClient(adapter).createTask(request)).rejects.toMatchObject({
        code: 'EBADRESPONSE',
        dependency: 'agent-api',
      });
    });

    it('surfaces API errors with their status', async () => {
      const adapter = makeAdapter(401, { error: 'bad key' });

      const error = await makeClient(adapter)
        .createTask(request)
        .then(
          () => undefined,
          (e: unknown) => e,
        );

      expect(error).toBeInstanceOf(RemoteCallError);
      expect(error).toMatchObject({ statusCode: 401, responseBody: { error: 'bad key' } });
    });

    it('reads run status', async () => {
      const adapter = makeAdapter(200, {
        run_id: 'agent-run-1',
        status: 'running',
        progress: 0.4,
        current_step: 'Writing tests',
      });

      await expect(makeClient(adapter).getTaskStatus('agent-run-1')).resolves.toEqual({
        externalRef: 'agent-run-1',
        status: 'running',
        progress: 0.4,
        currentStep: 'Writing tests',
        errorMessage: undefined,
      });
      expect(adapter.mock.calls[0][0].url).toBe('/v1/agents/runs/agent-run-1');
    });

    it('reports whether cancellation was accepted', async () => {
      await expect(makeClient(makeAdapter(200)).cancelTask('agent-run-1')).resolves.toBe(true);
      await expect(makeClient(makeAdapter(409)).cancelTask('agent-run-1')).resolves.toBe(false);
      await expect(makeClient(makeAdapter(500)).cancelTask('agent-run-1')).rejects.toBeInstanceOf(
        RemoteCallError,
      );
    });
  });

  describe('RepositoryDispatchClient', () => {
    it('fires a repository_dispatch event and expects 204', async () => {
      const adapter = makeAdapter(204);
      const client = new RepositoryDispatchClient(
        httpFor(adapter, 'repository-dispatch'),
        'acme/widgets',
      );

      await expect(client.createTask(request)).resolves.toEqual({});

      expect(adapter.mock.calls[0][0].url).toBe('/repos/acme/widgets/dispatches');
      expect(sentBody(adapter)).toEqual({
        event_type: 'copilot-fix',
        client_payload: {
          ticket_id: 'TICK-1',
          ticket_summary: 'Null check missing',
          ticket_description: 'Crash when the profile is empty',
          jira_url: 'https://jira.example.test/browse/TICK-1',
          run_id: 'run_abc',
          branch_base: 'main',
        },
      });
      await expect(client.getTaskStatus()).resolves.toBeNull();
    });

    it('fails on any other status', async () => {
      const client = new RepositoryDispatchClient(
        httpFor(makeAdapter(422, { message: 'Invalid request' }), 'repository-dispatch'),
        'acme/widgets',
      );

      await expect(client.createTask(request)).rejects.toMatchObject({ statusCode: 422 });
    });
  });

  describe('SimulatedAgentClient', () => {
    it('creates running tasks that can be cancelled once', async () => {
      const client = new SimulatedAgentClient();

      const { externalRef } = await client.createTask(request);
      if (!externalRef) {
        throw new Error('simulated client returned no reference');
      }

      expect(externalRef).toMatch(/^sim_/);
      await expect(client.getTaskStatus(externalRef)).resolves.toMatchObject({
        status: 'running',
      });
      await expect(client.cancelTask(externalRef)).resolves.toBe(true);
      await expect(client.cancelTask(externalRef)).resolves.toBe(false);
      await expect(client.getTaskStatus('sim_unknown')).resolves.toBeNull();
    });
  });

  describe('client selection', () => {
    const settings = (values: Record<string, string>) =>
      loadRemoteSettings(new ConfigService(values));

    it('defaults to the simulated agent with the dispatch fallback', () => {
      const remote = settings({ GITHUB_TOKEN: 'test-token', GITHUB_REPO: 'acme/widgets' });

      expect(createPrimaryClient(remote).name).toBe('simulated-agent');
      expect(createFallbackClient(remote)?.name).toBe('repository-dispatch');
    });

    it('requires an API key for the agent API', () => {
      expect(() => createPrimaryClient(settings({ PRIMARY_EXECUTOR: 'agent-api' }))).toThrow(
        'AGENT_API_KEY is required when PRIMARY_EXECUTOR=agent-api',
      );
      expect(
        createPrimaryClient(settings({ PRIMARY_EXECUTOR: 'agent-api', AGENT_API_KEY: 'test-key' }))
          .name,
      ).toBe('agent-api');
    });

    it('disables the fallback when switched off or unconfigured', () => {
      expect(
        createFallbackClient(
          settings({ FALLBACK_ENABLED: 'false', GITHUB_TOKEN: 'test-token', GITHUB_REPO: 'a/b' }),
        ),
      ).toBeNull();
      expect(createFallbackClient(settings({}))).toBeNull();
    });

    it('rejects unknown executors', () => {
      expect(() => settings({ PRIMARY_EXECUTOR: 'mainframe' })).toThrow(/Invalid PRIMARY_EXECUTOR/);
    });
  });
});
