import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WORKER_SETTINGS, loadWorkerSettings } from './worker-settings';

/** Resolves WorkerSettings once at startup and shares it app-wide. */
@Global()
@Module({
  providers: [
    {
      provide: WORKER_SETTINGS,
      inject: [ConfigService],
      useFactory: loadWorkerSettings,
    },
  ],
  exports: [WORKER_SETTINGS],
})
export class WorkerConfigModule {}
