import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { BatchRunner } from './pipeline/batch-runner.service';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  const logger = app.get(Logger);
  app.useLogger(logger);

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.warn(`${signal} received, finishing in-flight organizations`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const { summary } = await app.get(BatchRunner).runFromFiles(undefined, undefined, {
      signal: controller.signal,
    });
    if (summary.cancelled > 0) {
      process.exitCode = 130;
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Fatal:', error instanceof Error ? (error.stack ?? error.message) : error);
  process.exitCode = 1;
});
