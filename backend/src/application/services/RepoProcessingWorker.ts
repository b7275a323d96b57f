import { ExtractedContent, IContentExtractor } from '../../domain/ports/IContentExtractor';
import { IBroker, QUEUES, ReceivedMessage } from '../../domain/ports/IBroker';
import { IRepositoryFetcher } from '../../domain/ports/IRepositoryFetcher';
import { IUnitOfWork } from '../../domain/ports/IUnitOfWork';
import { IAnalysisJobRepository } from '../../domain/repositories/IAnalysisJobRepository';
import { RepositoryReference } from '../../domain/value-objects/RepositoryReference';
import { MalformedMessageError, describeError } from '../../domain/errors';
import { SubmittedJobPayload, parseMessage, peekJobId } from '../messages/PipelineMessages';
import { QueueWorker, QueueWorkerOptions } from './QueueWorker';

/**
 * Stage 1: clone the submitted repository, extract its text and hand it to
 * the analysis stage.
 */
export class RepoProcessingWorker extends QueueWorker {
  constructor(
    broker: IBroker,
    private readonly jobRepo: IAnalysisJobRepository,
    private readonly unitOfWork: IUnitOfWork,
    private readonly fetcher: IRepositoryFetcher,
    private readonly extractor: IContentExtractor,
    options: QueueWorkerOptions = {},
  ) {
    super(broker, QUEUES.submitted, options);
  }

  protected async handle(message: ReceivedMessage): Promise<void> {
    const payload = parseMessage(SubmittedJobPayload, message.payload);
    const jobId = payload.id;

    const started = await this.jobRepo.update(jobId, { status: 'processing' });
    if (started.outcome === 'not_found') {
      throw new MalformedMessageError(`Job not found: ${jobId}`);
    }
    if (started.outcome === 'stale') {
      if (!started.job.status.isProcessing) {
        this.logger.log(`[job ${jobId}] already ${started.job.status}; dropping duplicate request`);
        return;
      }
      // Lease expired or the worker died mid-job: do the work again
      this.logger.log(`[job ${jobId}] redelivered while processing (attempt ${message.attempts}); resuming`);
    } else {
      this.logger.log(`[job ${jobId}] processing ${payload.repositoryReference}`);
    }

    const job = started.job;
    let extracted: ExtractedContent;
    try {
      extracted = await this.fetchAndExtract(RepositoryReference.create(payload.repositoryReference), jobId);
    } catch (error) {
      await this.failJob(jobId, describeError(error));
      return;
    }

    await this.unitOfWork.run(async () => {
      const moved = await this.jobRepo.update(jobId, { status: 'analyzing' });
      if (moved.outcome !== 'applied') {
        this.logger.warn(`[job ${jobId}] no longer processing; extracted content discarded`);
        return;
      }
      await this.broker.enqueue(QUEUES.extracted, {
        id: jobId,
        extractedContent: extracted.text,
        parameters: job.parameters.toJSON(),
      });
    });

    this.logger.log(
      `[job ${jobId}] extracted ${extracted.importantFiles} important and ${extracted.sourceFiles} source files; queued for analysis`,
    );
  }

  protected async giveUp(message: ReceivedMessage, reason: string): Promise<void> {
    const jobId = peekJobId(message.payload);
    if (!jobId) {
      return;
    }
    await this.failJob(jobId, `Repository processing ${reason}`);
  }

  private async fetchAndExtract(reference: RepositoryReference, jobId: string): Promise<ExtractedContent> {
    const repository = await this.fetcher.fetch(reference, jobId);
    try {
      return await this.extractor.extract(repository.path);
    } finally {
      await repository.cleanup().catch((error: unknown) => {
        this.logger.warn(`[job ${jobId}] could not remove ${repository.path}: ${describeError(error)}`);
      });
    }
  }

  private async failJob(jobId: string, errorMessage: string): Promise<void> {
    const result = await this.jobRepo.update(jobId, { status: 'failed', errorMessage });
    if (result.outcome === 'applied') {
      this.logger.warn(`[job ${jobId}] failed: ${errorMessage}`);
    } else {
      this.logger.log(`[job ${jobId}] not marked failed (${result.outcome}): ${errorMessage}`);
    }
  }
}
