import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { CallbacksModule } from './callbacks/callbacks.module';
import { DispatchModule } from './dispatch/dispatch.module';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { NotificationsModule } from './notifications/notifications.module';
import { RemoteModule } from './remote/remote.module';
import { ResilienceModule } from './resilience/resilience.module';
import { RunsModule } from './runs/runs.module';

@Module({
  imports: [
    EventEmitterModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ResilienceModule, // breakers shared by every remote dependency
    RunsModule,
    RemoteModule,
    NotificationsModule,
    DispatchModule,
    CallbacksModule,
    HealthModule,
    MetricsModule,
  ],
})
export class AppModule {}
