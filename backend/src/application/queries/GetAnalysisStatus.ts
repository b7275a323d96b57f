import type { AnalysisJobDto, HistoryListDto } from '@repo-digest/shared';
import { AnalysisJob } from '../../domain/entities/AnalysisJob';
import { DEFAULT_HISTORY_LIMIT, IAnalysisJobRepository } from '../../domain/repositories/IAnalysisJobRepository';
import { JobNotFoundError } from '../../domain/errors';

export function toAnalysisJobDto(job: AnalysisJob): AnalysisJobDto {
  return {
    id: job.id,
    status: job.status.value,
    repositoryReference: job.repositoryReference,
    parameters: job.parameters.toJSON(),
    summaryContent: job.summaryContent,
    errorMessage: job.errorMessage,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
}

/**
 * Query to poll job status and read an owner's history
 */
export class GetAnalysisStatusQuery {
  constructor(
    private readonly jobRepo: IAnalysisJobRepository,
    private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT,
  ) {}

  /**
   * Guests may poll any id they hold; an owned job is hidden from other owners
   */
  async getById(jobId: string, requester?: string | null): Promise<AnalysisJobDto> {
    const job = await this.jobRepo.findById(jobId);
    if (!job || (requester && job.ownerIdentity && !job.isOwnedBy(requester))) {
      throw new JobNotFoundError(jobId);
    }
    return toAnalysisJobDto(job);
  }

  async listHistory(ownerIdentity: string): Promise<HistoryListDto> {
    const jobs = await this.jobRepo.findByOwner(ownerIdentity, this.historyLimit);
    return {
      items: jobs.map(toAnalysisJobDto),
      total: await this.jobRepo.countByOwner(ownerIdentity),
    };
  }

  async getHistoryItem(ownerIdentity: string, jobId: string): Promise<AnalysisJobDto> {
    const job = await this.jobRepo.findById(jobId);
    if (!job || !job.isOwnedBy(ownerIdentity)) {
      throw new JobNotFoundError(jobId);
    }
    return toAnalysisJobDto(job);
  }
}
