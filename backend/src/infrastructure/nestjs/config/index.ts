import { ConfigModule } from '@nestjs/config';
import { pipelineConfig } from './pipeline.config';
import { validateEnvironment } from './env.validation';

export * from './pipeline.config';
export { validateEnvironment, LOG_LEVELS } from './env.validation';

export const AppConfigModule = ConfigModule.forRoot({
  isGlobal: true,
  envFilePath: ['.env', '../.env'],
  load: [pipelineConfig],
  validate: validateEnvironment,
});
