import { Module } from '@nestjs/common';
import { NotificationsModule } from '../notifications/notifications.module';
import { RemoteModule } from '../remote/remote.module';
import { RunsModule } from '../runs/runs.module';
import { JiraWebhookController } from './jira-webhook.controller';
import { RunsController } from './runs.controller';
import { TaskDispatcherService } from './task-dispatcher.service';

@Module({
  imports: [RunsModule, RemoteModule, NotificationsModule],
  controllers: [JiraWebhookController, RunsController],
  providers: [TaskDispatcherService],
  exports: [TaskDispatcherService],
})
export class DispatchModule {}
