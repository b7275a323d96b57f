import { Module } from '@nestjs/common';
import { AppConfigModule, CoreModule, WorkersModule } from './infrastructure';

/**
 * Worker-only process: no HTTP listener, stages chosen by PIPELINE_STAGES
 */
@Module({
  imports: [AppConfigModule, CoreModule, WorkersModule],
})
export class WorkerModule {}
