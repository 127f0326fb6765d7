import { ConfigService } from '@nestjs/config';

export type PrimaryExecutor = 'agent-api' | 'simulated-agent';

export interface RemoteSettings {
  primaryExecutor: PrimaryExecutor;
  fallbackEnabled: boolean;
  agentApiUrl: string;
  agentApiKey?: string;
  agentId?: string;
  callbackUrl?: string;
  timeoutMs: number;
  maxConcurrent: number;
  maxQueue: number;
  githubToken?: string;
  githubRepo?: string;
  githubApiUrl: string;
}

function optional(configService: ConfigService, key: string): string | undefined {
  const value = configService.get<string>(key);
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function positiveInt(configService: ConfigService, key: string, fallback: string): number {
  const raw = configService.get<string>(key, fallback);
  const value = parseInt(String(raw), 10);
  if (isNaN(value) || value <= 0) {
    throw new Error(`Invalid ${key}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadRemoteSettings(configService: ConfigService): RemoteSettings {
  const primaryExecutor = configService.get<string>('PRIMARY_EXECUTOR', 'simulated-agent');
  if (primaryExecutor !== 'agent-api' && primaryExecutor !== 'simulated-agent') {
    throw new Error(
      `Invalid PRIMARY_EXECUTOR "${primaryExecutor}" (expected agent-api or simulated-agent)`,
    );
  }

  return {
    primaryExecutor,
    fallbackEnabled: String(configService.get<string>('FALLBACK_ENABLED', 'true')) === 'true',
    agentApiUrl: configService.get<string>('AGENT_API_URL', 'https://api.agenthq.dev'),
    agentApiKey: optional(configService, 'AGENT_API_KEY'),
    agentId: optional(configService, 'AGENT_ID'),
    callbackUrl: optional(configService, 'AGENT_CALLBACK_URL'),
    timeoutMs: positiveInt(configService, 'REMOTE_CALL_TIMEOUT_MS', '30000'),
    maxConcurrent: positiveInt(configService, 'REMOTE_MAX_CONCURRENT', '10'),
    maxQueue: positiveInt(configService, 'REMOTE_MAX_QUEUE', '50'),
    githubToken: optional(configService, 'GITHUB_TOKEN'),
    githubRepo: optional(configService, 'GITHUB_REPO'),
    githubApiUrl: configService.get<string>('GITHUB_API_URL', 'https://api.github.com'),
  };
}
