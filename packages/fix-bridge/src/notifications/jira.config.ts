import { ConfigService } from '@nestjs/config';

export interface JiraSettings {
  baseUrl?: string;
  email?: string;
  apiToken?: string;
  triggerLabel: string;
}

export function loadJiraSettings(configService: ConfigService): JiraSettings {
  const read = (key: string): string | undefined => {
    const value = configService.get<string>(key);
    return value && value.trim() !== '' ? value.trim() : undefined;
  };

  return {
    baseUrl: read('JIRA_BASE_URL')?.replace(/\/+$/, ''),
    email: read('JIRA_EMAIL'),
    apiToken: read('JIRA_API_TOKEN'),
    triggerLabel: configService.get<string>('JIRA_TRIGGER_LABEL', 'copilot-fix'),
  };
}

export function isJiraConfigured(settings: JiraSettings): boolean {
  return Boolean(settings.baseUrl && settings.email && settings.apiToken);
}

export function ticketUrl(settings: JiraSettings, issueKey: string): string | undefined {
  return settings.baseUrl ? `${settings.baseUrl}/browse/${issueKey}` : undefined;
}
