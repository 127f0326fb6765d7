import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { RemoteModule } from '../remote/remote.module';
import { DispatchHealthIndicator } from './dispatch-health.indicator';
import { HealthController } from './health.controller';

@Module({
  imports: [TerminusModule, RemoteModule],
  controllers: [HealthController],
  providers: [DispatchHealthIndicator],
})
export class HealthModule {}
