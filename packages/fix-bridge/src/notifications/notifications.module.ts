import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { REMOTE_SETTINGS, RemoteModule } from '../remote/remote.module';
import { RemoteHttp } from '../remote/remote-http';
import { RemoteSettings } from '../remote/remote.config';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.registry';
import { JiraCommentNotifier } from './jira-comment.notifier';
import { loadJiraSettings } from './jira.config';
import { LoggingNotifier } from './logging.notifier';
import { RunNotificationService } from './run-notification.service';
import { TicketNotifier } from './ticket-notifier';

export function createTicketNotifier(
  configService: ConfigService,
  remote: RemoteSettings,
  breakers: CircuitBreakerRegistry,
): TicketNotifier {
  const jira = loadJiraSettings(configService);
  if (!jira.baseUrl || !jira.email || !jira.apiToken) {
    new Logger('NotificationsModule').warn(
      'Jira credentials not configured - run outcomes will only be logged',
    );
    return new LoggingNotifier();
  }

  const http = new RemoteHttp(
    axios.create({
      baseURL: jira.baseUrl,
      auth: { username: jira.email, password: jira.apiToken },
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
    }),
    {
      dependency: 'jira',
      timeoutMs: remote.timeoutMs,
      maxConcurrent: remote.maxConcurrent,
      maxQueue: remote.maxQueue,
    },
  );

  return new JiraCommentNotifier(http, breakers.get('jira'));
}

@Module({
  imports: [RemoteModule],
  providers: [
    {
      provide: TicketNotifier,
      inject: [ConfigService, REMOTE_SETTINGS, CircuitBreakerRegistry],
      useFactory: createTicketNotifier,
    },
    RunNotificationService,
  ],
  exports: [RunNotificationService],
})
export class NotificationsModule {}
