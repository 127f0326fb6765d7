/**
 * Remote Module
 *
 * Builds the primary and fallback task clients from configuration.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createFallbackClient, createPrimaryClient } from './remote-client.factory';
import { loadRemoteSettings } from './remote.config';
import { FALLBACK_TASK_CLIENT, PRIMARY_TASK_CLIENT } from './remote-task-client';

export const REMOTE_SETTINGS = 'REMOTE_SETTINGS';

@Module({
  providers: [
    {
      provide: REMOTE_SETTINGS,
      inject: [ConfigService],
      useFactory: loadRemoteSettings,
    },
    {
      provide: PRIMARY_TASK_CLIENT,
      inject: [REMOTE_SETTINGS],
      useFactory: createPrimaryClient,
    },
    {
      provide: FALLBACK_TASK_CLIENT,
      inject: [REMOTE_SETTINGS],
      useFactory: createFallbackClient,
    },
  ],
  exports: [REMOTE_SETTINGS, PRIMARY_TASK_CLIENT, FALLBACK_TASK_CLIENT],
})
export class RemoteModule {}
