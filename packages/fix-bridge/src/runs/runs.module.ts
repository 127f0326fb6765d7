import { Module } from '@nestjs/common';
import { RunRegistryService } from './run-registry.service';
import { InMemoryRunStore, RunStore } from './run-store';

@Module({
  providers: [{ provide: RunStore, useClass: InMemoryRunStore }, RunRegistryService],
  exports: [RunRegistryService],
})
export class RunsModule {}
