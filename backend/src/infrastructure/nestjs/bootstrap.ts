import { INestApplication, LogLevel, ValidationPipe } from '@nestjs/common';
import { LOG_LEVELS, PipelineConfig, pipelineConfig } from './config';

export const API_PREFIX = 'api';

/**
 * Settings shared by the server entry point and the HTTP tests
 */
export function configureApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix(API_PREFIX);
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
  return app;
}

export function listenPort(app: INestApplication): number {
  return app.get<PipelineConfig>(pipelineConfig.KEY).port;
}

/**
 * LOG_LEVEL names the most verbose level to print; unset means "log"
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(0, index === -1 ? LOG_LEVELS.indexOf('log') + 1 : index + 1);
}
