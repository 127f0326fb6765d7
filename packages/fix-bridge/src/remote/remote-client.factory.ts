import { Logger } from '@nestjs/common';
import axios from 'axios';
import { AgentApiClient } from './agent-api.client';
import { RemoteHttp } from './remote-http';
import { RemoteSettings } from './remote.config';
import { RemoteTaskClient } from './remote-task-client';
import { RepositoryDispatchClient } from './repository-dispatch.client';
import { SimulatedAgentClient } from './simulated-agent.client';

const logger = new Logger('RemoteClientFactory');

const USER_AGENT = 'fix-bridge/1.0';

export function createPrimaryClient(settings: RemoteSettings): RemoteTaskClient {
  if (settings.primaryExecutor === 'simulated-agent') {
    logger.log('Primary executor: simulated agent');
    return new SimulatedAgentClient();
  }

  if (!settings.agentApiKey) {
    throw new Error('AGENT_API_KEY is required when PRIMARY_EXECUTOR=agent-api');
  }
  if (!settings.callbackUrl) {
    logger.warn('AGENT_CALLBACK_URL is not set - completions will not be reported back');
  }

  const http = new RemoteHttp(
    axios.create({
      baseURL: settings.agentApiUrl,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT,
        Authorization: `Bearer ${settings.agentApiKey}`,
      },
    }),
    {
      dependency: 'agent-api',
      timeoutMs: settings.timeoutMs,
      maxConcurrent: settings.maxConcurrent,
      maxQueue: settings.maxQueue,
    },
  );

  logger.log(`Primary executor: agent API at ${settings.agentApiUrl}`);
  return new AgentApiClient(http, {
    agentId: settings.agentId,
    callbackUrl: settings.callbackUrl,
    defaultRepository: settings.githubRepo,
  });
}

/**
 * Repository-dispatch fallback, or null when disabled or not configured
 */
export function createFallbackClient(settings: RemoteSettings): RemoteTaskClient | null {
  if (!settings.fallbackEnabled) {
    logger.log('Fallback executor disabled');
    return null;
  }

  if (!settings.githubToken || !settings.githubRepo) {
    logger.warn('FALLBACK_ENABLED but GITHUB_TOKEN/GITHUB_REPO missing - fallback disabled');
    return null;
  }

  const http = new RemoteHttp(
    axios.create({
      baseURL: settings.githubApiUrl,
      headers: {
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
        'User-Agent': USER_AGENT,
        Authorization: `Bearer ${settings.githubToken}`,
      },
    }),
    {
      dependency: 'repository-dispatch',
      timeoutMs: settings.timeoutMs,
      maxConcurrent: settings.maxConcurrent,
      maxQueue: settings.maxQueue,
    },
  );

  logger.log(`Fallback executor: repository dispatch on ${settings.githubRepo}`);
  return new RepositoryDispatchClient(http, settings.githubRepo);
}
