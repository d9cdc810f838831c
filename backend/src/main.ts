import 'reflect-metadata';
import { Logger, type LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module.js';
import type { AppConfig } from './config/index.js';

function resolveLogLevels(nodeEnv: string): LogLevel[] {
  if (nodeEnv === 'production') {
    return ['error', 'warn'];
  }
  if (nodeEnv === 'test') {
    return ['error'];
  }
  return ['log', 'error', 'warn', 'debug'];
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService);
  const { nodeEnv, port } = configService.getOrThrow<AppConfig['app']>('app');
  app.useLogger(resolveLogLevels(nodeEnv));

  // Chat requests may carry base64 images
  app.useBodyParser('json', { limit: '20mb' });
  app.useBodyParser('urlencoded', { extended: true, limit: '20mb' });
  app.enableShutdownHooks();

  try {
    await app.listen(port);
    Logger.log(`HTTP server listening on port ${port} (env: ${nodeEnv})`, 'Bootstrap');
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'EADDRINUSE'
    ) {
      Logger.error(
        `Port ${port} is already in use. Stop the other instance or change PORT.`,
        'Bootstrap',
      );
      process.exit(1);
    }
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Bootstrap failed: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  process.exit(1);
});
