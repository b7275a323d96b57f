import { Module, Global, Inject, Logger, OnApplicationShutdown } from '@nestjs/common';
import Database from 'better-sqlite3';
import {
  ANALYSIS_JOB_REPOSITORY,
  BROKER,
  UNIT_OF_WORK,
  GITHUB_API_CLIENT,
  REPOSITORY_FETCHER,
  CONTENT_EXTRACTOR,
  COMMAND_RUNNER,
  SUMMARIZER_FACTORY,
  SUMMARIZER,
  IAnalysisJobRepository,
  IBroker,
  IUnitOfWork,
  IGitHubApiClient,
  ICommandRunner,
  ISummarizerFactory,
} from '../../../domain';
import { SubmitAnalysisCommand, GetAnalysisStatusQuery, GetPipelineHealthQuery } from '../../../application';
import { createDatabase, SqliteAnalysisJobRepository, SqliteUnitOfWork } from '../../persistence/sqlite';
import { SqliteBroker } from '../../queue';
import { GitHubApiClient } from '../../github';
import { GitRepositoryFetcher } from '../../git';
import { RepositoryContentExtractor } from '../../extraction';
import { CommandRunner } from '../../runner';
import { ClaudeCliSummarizer, GeminiSummarizer, SummarizerFactory } from '../../ai';
import { PipelineConfig, pipelineConfig } from '../config';

export const DATABASE_TOKEN = Symbol('DATABASE');

const logger = new Logger('CoreModule');

@Global()
@Module({
  providers: [
    // Database
    {
      provide: DATABASE_TOKEN,
      useFactory: (config: PipelineConfig) => createDatabase(config.databasePath),
      inject: [pipelineConfig.KEY],
    },

    // Store and broker share one connection so a unit of work spans both
    {
      provide: ANALYSIS_JOB_REPOSITORY,
      useFactory: (db: Database.Database) => new SqliteAnalysisJobRepository(db),
      inject: [DATABASE_TOKEN],
    },
    {
      provide: BROKER,
      useFactory: (db: Database.Database, config: PipelineConfig) =>
        new SqliteBroker(db, { visibilityTimeoutMs: config.visibilityTimeoutMs }),
      inject: [DATABASE_TOKEN, pipelineConfig.KEY],
    },
    {
      provide: UNIT_OF_WORK,
      useFactory: (db: Database.Database) => new SqliteUnitOfWork(db),
      inject: [DATABASE_TOKEN],
    },

    // Infrastructure services
    {
      provide: GITHUB_API_CLIENT,
      useFactory: (config: PipelineConfig) => new GitHubApiClient(config.githubToken || undefined),
      inject: [pipelineConfig.KEY],
    },
    {
      provide: COMMAND_RUNNER,
      useFactory: () => new CommandRunner(),
    },
    {
      provide: REPOSITORY_FETCHER,
      useFactory: (apiClient: IGitHubApiClient, config: PipelineConfig) =>
        new GitRepositoryFetcher(apiClient, {
          cloneDir: config.cloneDir,
          timeoutMs: config.fetchTimeoutMs,
          maxRepositorySizeKb: config.maxRepositorySizeKb,
          token: config.githubToken,
        }),
      inject: [GITHUB_API_CLIENT, pipelineConfig.KEY],
    },
    {
      provide: CONTENT_EXTRACTOR,
      useFactory: (config: PipelineConfig) =>
        new RepositoryContentExtractor({
          maxSourceFiles: config.maxSourceFiles,
          maxChars: config.maxExtractedChars,
        }),
      inject: [pipelineConfig.KEY],
    },

    // Summarizers
    {
      provide: SUMMARIZER_FACTORY,
      useFactory: (runner: ICommandRunner, config: PipelineConfig) =>
        new SummarizerFactory([
          new GeminiSummarizer({ apiKey: config.geminiApiKey, model: config.geminiModel }),
          new ClaudeCliSummarizer(runner, { model: config.claudeModel, timeoutMs: config.analysisTimeoutMs }),
        ]),
      inject: [COMMAND_RUNNER, pipelineConfig.KEY],
    },
    {
      provide: SUMMARIZER,
      useFactory: async (factory: ISummarizerFactory, config: PipelineConfig) => {
        const summarizer = factory.getSummarizer(config.summarizer);
        if (!(await summarizer.isAvailable())) {
          logger.warn(`Summarizer "${summarizer.name}" is not available; analyses will fail until it is configured`);
        }
        return summarizer;
      },
      inject: [SUMMARIZER_FACTORY, pipelineConfig.KEY],
    },

    // Use cases
    {
      provide: SubmitAnalysisCommand,
      useFactory: (jobRepo: IAnalysisJobRepository, broker: IBroker, unitOfWork: IUnitOfWork) =>
        new SubmitAnalysisCommand(jobRepo, broker, unitOfWork),
      inject: [ANALYSIS_JOB_REPOSITORY, BROKER, UNIT_OF_WORK],
    },
    {
      provide: GetAnalysisStatusQuery,
      useFactory: (jobRepo: IAnalysisJobRepository, config: PipelineConfig) =>
        new GetAnalysisStatusQuery(jobRepo, config.historyLimit),
      inject: [ANALYSIS_JOB_REPOSITORY, pipelineConfig.KEY],
    },
    {
      provide: GetPipelineHealthQuery,
      useFactory: (jobRepo: IAnalysisJobRepository, broker: IBroker) => new GetPipelineHealthQuery(jobRepo, broker),
      inject: [ANALYSIS_JOB_REPOSITORY, BROKER],
    },
  ],
  exports: [
    DATABASE_TOKEN,
    ANALYSIS_JOB_REPOSITORY,
    BROKER,
    UNIT_OF_WORK,
    GITHUB_API_CLIENT,
    COMMAND_RUNNER,
    REPOSITORY_FETCHER,
    CONTENT_EXTRACTOR,
    SUMMARIZER_FACTORY,
    SUMMARIZER,
    SubmitAnalysisCommand,
    GetAnalysisStatusQuery,
    GetPipelineHealthQuery,
  ],
})
export class CoreModule implements OnApplicationShutdown {
  constructor(@Inject(DATABASE_TOKEN) private readonly db: Database.Database) {}

  // Runs after every module's onModuleDestroy, so worker loops have stopped
  onApplicationShutdown(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
