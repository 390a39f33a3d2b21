import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RedisModule } from '@sheetwise/redis';
import { validateEnvironment } from './config/environment.validation';
import { WorkerConfigModule } from './config/worker-config.module';
import { HealthModule } from './health/health.module';
import { JobsModule } from './jobs/jobs.module';
import { WatchdogModule } from './watchdog/watchdog.module';
import { WorkerPoolModule } from './worker-pool/worker-pool.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnvironment,
    }),
    WorkerConfigModule,

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: configService.get<number>('POSTGRES_PORT', 5432),
        username: configService.get<string>('POSTGRES_USER', 'sheetwise'),
        password: configService.get<string>(
          'POSTGRES_PASSWORD',
          'sheetwise_dev',
        ),
        database: configService.get<string>('POSTGRES_DB', 'sheetwise'),
        autoLoadEntities: true,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') !== 'production',
      }),
    }),

    // ── Redis (PubSub + work queue, global) ───────────────
    RedisModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    JobsModule,
    WorkerPoolModule,
    WatchdogModule,
  ],
})
export class AppModule {}
