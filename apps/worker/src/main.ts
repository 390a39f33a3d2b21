import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import {
  EXTRACTION_PROTO_PATH,
  SHEETWISE_PACKAGE_NAME,
} from '@sheetwise/proto';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // Hybrid application: HTTP for health checks + gRPC for the job API
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  // Lets the worker pool drain in-flight jobs on SIGTERM
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  const grpcHost = configService.get<string>('WORKER_GRPC_HOST', '0.0.0.0');
  const grpcPort = configService.get<number>('WORKER_GRPC_PORT', 50051);

  // ── gRPC Microservice ───────────────────────────────────
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.GRPC,
    options: {
      package: SHEETWISE_PACKAGE_NAME,
      protoPath: EXTRACTION_PROTO_PATH,
      url: `${grpcHost}:${grpcPort}`,
    },
  });

  await app.startAllMicroservices();

  const httpPort = configService.get<number>('WORKER_HTTP_PORT', 50052);
  await app.listen(httpPort);

  logger.log(`Worker gRPC server listening on ${grpcHost}:${grpcPort}`);
  logger.log(`Worker health check on http://localhost:${httpPort}/health`);
}

bootstrap().catch((error: unknown) => {
  const message =
    error instanceof Error ? (error.stack ?? error.message) : String(error);
  new Logger('Bootstrap').error(`Worker failed to start: ${message}`);
  process.exit(1);
});
