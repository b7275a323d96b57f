import { IBroker, QUEUES, ReceivedMessage, ResultMessage } from '../../domain/ports/IBroker';
import { ISummarizer } from '../../domain/ports/ISummarizer';
import { IAnalysisJobRepository } from '../../domain/repositories/IAnalysisJobRepository';
import { AnalysisError, MalformedMessageError, describeError } from '../../domain/errors';
import { ExtractedContentPayload, parseMessage, peekJobId } from '../messages/PipelineMessages';
import { QueueWorker, QueueWorkerOptions } from './QueueWorker';
import { withTimeout } from './withTimeout';

export interface AiAnalysisWorkerOptions extends QueueWorkerOptions {
  analysisTimeoutMs?: number;
}

export const DEFAULT_ANALYSIS_TIMEOUT_MS = 180000;

/**
 * Stage 2: summarize extracted content and publish the outcome.
 * Reads the job store but never writes it; the result consumer does.
 */
export class AiAnalysisWorker extends QueueWorker {
  private readonly analysisTimeoutMs: number;

  constructor(
    broker: IBroker,
    private readonly jobRepo: IAnalysisJobRepository,
    private readonly summarizer: ISummarizer,
    options: AiAnalysisWorkerOptions = {},
  ) {
    super(broker, QUEUES.extracted, options);
    this.analysisTimeoutMs = options.analysisTimeoutMs ?? DEFAULT_ANALYSIS_TIMEOUT_MS;
  }

  protected async handle(message: ReceivedMessage): Promise<void> {
    const payload = parseMessage(ExtractedContentPayload, message.payload);
    const jobId = payload.id;

    const job = await this.jobRepo.findById(jobId);
    if (!job) {
      throw new MalformedMessageError(`Job not found: ${jobId}`);
    }
    if (job.isTerminal) {
      this.logger.log(`[job ${jobId}] already ${job.status}; dropping stale analysis request`);
      return;
    }

    this.logger.log(`[job ${jobId}] summarizing ${payload.extractedContent.length} chars with ${this.summarizer.name}`);
    let result: ResultMessage;
    try {
      const summaryContent = await withTimeout(
        (signal) => this.summarizer.summarize(payload.extractedContent, payload.parameters, signal),
        this.analysisTimeoutMs,
        () => new AnalysisError(`Summarization timed out after ${this.analysisTimeoutMs}ms`),
      );
      if (summaryContent.trim() === '') {
        throw new AnalysisError(`Summarizer ${this.summarizer.name} returned an empty summary`);
      }
      result = { id: jobId, status: 'completed', summaryContent };
    } catch (error) {
      // The result consumer drops a failed result without a message
      const errorMessage = describeError(error).trim() || 'Unknown error';
      this.logger.warn(`[job ${jobId}] summarization failed: ${errorMessage}`);
      result = { id: jobId, status: 'failed', errorMessage };
    }

    await this.broker.enqueue(QUEUES.results, result);
  }

  protected async giveUp(message: ReceivedMessage, reason: string): Promise<void> {
    const jobId = peekJobId(message.payload);
    if (!jobId) {
      return;
    }
    await this.broker.enqueue(QUEUES.results, { id: jobId, status: 'failed', errorMessage: `Summarization ${reason}` });
  }
}
