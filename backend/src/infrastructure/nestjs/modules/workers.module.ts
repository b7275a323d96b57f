import { Module, Inject, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import {
  ANALYSIS_JOB_REPOSITORY,
  BROKER,
  UNIT_OF_WORK,
  REPOSITORY_FETCHER,
  CONTENT_EXTRACTOR,
  SUMMARIZER,
  IAnalysisJobRepository,
  IBroker,
  IUnitOfWork,
  IRepositoryFetcher,
  IContentExtractor,
  ISummarizer,
} from '../../../domain';
import { QueueWorker, QueueWorkerOptions, RepoProcessingWorker, AiAnalysisWorker, ResultConsumer } from '../../../application';
import { PipelineConfig, PipelineStage, pipelineConfig } from '../config';

function workerOptions(config: PipelineConfig): QueueWorkerOptions {
  return {
    pollIntervalMs: config.pollIntervalMs,
    concurrency: config.concurrency,
    maxDeliveryAttempts: config.maxDeliveryAttempts,
  };
}

/**
 * Stage worker pools. Each stage listed in PIPELINE_STAGES starts consuming
 * when the module initializes and stops before the database closes.
 */
@Module({
  providers: [
    {
      provide: RepoProcessingWorker,
      useFactory: (
        broker: IBroker,
        jobRepo: IAnalysisJobRepository,
        unitOfWork: IUnitOfWork,
        fetcher: IRepositoryFetcher,
        extractor: IContentExtractor,
        config: PipelineConfig,
      ) => new RepoProcessingWorker(broker, jobRepo, unitOfWork, fetcher, extractor, workerOptions(config)),
      inject: [BROKER, ANALYSIS_JOB_REPOSITORY, UNIT_OF_WORK, REPOSITORY_FETCHER, CONTENT_EXTRACTOR, pipelineConfig.KEY],
    },
    {
      provide: AiAnalysisWorker,
      useFactory: (broker: IBroker, jobRepo: IAnalysisJobRepository, summarizer: ISummarizer, config: PipelineConfig) =>
        new AiAnalysisWorker(broker, jobRepo, summarizer, {
          ...workerOptions(config),
          analysisTimeoutMs: config.analysisTimeoutMs,
        }),
      inject: [BROKER, ANALYSIS_JOB_REPOSITORY, SUMMARIZER, pipelineConfig.KEY],
    },
    {
      provide: ResultConsumer,
      useFactory: (broker: IBroker, jobRepo: IAnalysisJobRepository, config: PipelineConfig) =>
        new ResultConsumer(broker, jobRepo, workerOptions(config)),
      inject: [BROKER, ANALYSIS_JOB_REPOSITORY, pipelineConfig.KEY],
    },
  ],
  exports: [RepoProcessingWorker, AiAnalysisWorker, ResultConsumer],
})
export class WorkersModule implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(WorkersModule.name);
  private started: QueueWorker[] = [];

  constructor(
    private readonly repoWorker: RepoProcessingWorker,
    private readonly aiWorker: AiAnalysisWorker,
    private readonly resultConsumer: ResultConsumer,
    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  onModuleInit(): void {
    const workers: Record<PipelineStage, QueueWorker> = {
      'repo-processing': this.repoWorker,
      'ai-analysis': this.aiWorker,
      results: this.resultConsumer,
    };

    if (this.config.stages.length === 0) {
      this.logger.log('No pipeline stages enabled in this process');
      return;
    }

    for (const stage of this.config.stages) {
      workers[stage].start();
      this.started.push(workers[stage]);
    }
    this.logger.log(`Started stages: ${this.config.stages.join(', ')}`);
  }

  async onModuleDestroy(): Promise<void> {
    await Promise.all(this.started.map((worker) => worker.stop()));
    this.started = [];
  }
}
