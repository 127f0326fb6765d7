import { Module } from '@nestjs/common';
import { NotificationsModule } from '../notifications/notifications.module';
import { RunsModule } from '../runs/runs.module';
import { CallbackHandlerService } from './callback-handler.service';
import { CallbacksController } from './callbacks.controller';

@Module({
  imports: [RunsModule, NotificationsModule],
  controllers: [CallbacksController],
  providers: [CallbackHandlerService],
})
export class CallbacksModule {}
