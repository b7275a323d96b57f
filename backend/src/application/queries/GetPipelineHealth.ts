import type { HealthDto, QueueHealthDto } from '@repo-digest/shared';
import { IBroker, QUEUE_NAMES } from '../../domain/ports/IBroker';
import { IAnalysisJobRepository } from '../../domain/repositories/IAnalysisJobRepository';

/**
 * Query for queue depths and job counts per status
 */
export class GetPipelineHealthQuery {
  constructor(
    private readonly jobRepo: IAnalysisJobRepository,
    private readonly broker: IBroker,
  ) {}

  async execute(): Promise<HealthDto> {
    const queues: Record<string, QueueHealthDto> = {};
    for (const queue of QUEUE_NAMES) {
      queues[queue] = {
        depth: await this.broker.depth(queue),
        deadLetters: await this.broker.deadLetterDepth(queue),
      };
    }

    return {
      status: 'ok',
      queues,
      jobs: await this.jobRepo.countByStatus(),
    };
  }
}
