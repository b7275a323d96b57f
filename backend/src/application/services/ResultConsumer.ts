import { JobTransition } from '../../domain/entities/AnalysisJob';
import { IBroker, QUEUES, ReceivedMessage } from '../../domain/ports/IBroker';
import { IAnalysisJobRepository } from '../../domain/repositories/IAnalysisJobRepository';
import { MalformedMessageError } from '../../domain/errors';
import { parseResultMessage } from '../messages/PipelineMessages';
import { QueueWorker, QueueWorkerOptions } from './QueueWorker';

/**
 * Stage 3: apply terminal results to the job store.
 * Duplicates and late results find a terminal job and are dropped.
 */
export class ResultConsumer extends QueueWorker {
  constructor(
    broker: IBroker,
    private readonly jobRepo: IAnalysisJobRepository,
    options: QueueWorkerOptions = {},
  ) {
    super(broker, QUEUES.results, options);
  }

  protected async handle(message: ReceivedMessage): Promise<void> {
    const result = parseResultMessage(message.payload);
    const transition: JobTransition =
      result.status === 'completed'
        ? { status: 'completed', summaryContent: result.summaryContent }
        : { status: 'failed', errorMessage: result.errorMessage };

    const outcome = await this.jobRepo.update(result.id, transition);
    switch (outcome.outcome) {
      case 'applied':
        this.logger.log(`[job ${result.id}] ${result.status}`);
        return;
      case 'stale':
        this.logger.log(`[job ${result.id}] ignoring ${result.status} result: ${outcome.reason}`);
        return;
      case 'not_found':
        throw new MalformedMessageError(`Job not found: ${result.id}`);
    }
  }
}
