import { Logger } from '@nestjs/common';
import { AnalysisJob } from '../../domain/entities/AnalysisJob';
import { IBroker, QUEUES } from '../../domain/ports/IBroker';
import { IUnitOfWork } from '../../domain/ports/IUnitOfWork';
import { IAnalysisJobRepository } from '../../domain/repositories/IAnalysisJobRepository';
import { RepositoryReference } from '../../domain/value-objects/RepositoryReference';
import { SummaryParameters, SummaryParametersInput } from '../../domain/value-objects/SummaryParameters';

export interface SubmitAnalysisInput {
  repositoryReference: string;
  parameters?: SummaryParametersInput;
  ownerIdentity?: string | null;
}

export interface SubmitAnalysisResult {
  id: string;
  status: 'queued';
}

/**
 * Command to accept a repository for summarization.
 * Validates the input, then creates the job and its stage-1 message in one
 * unit of work.
 */
export class SubmitAnalysisCommand {
  private readonly logger = new Logger(SubmitAnalysisCommand.name);

  constructor(
    private readonly jobRepo: IAnalysisJobRepository,
    private readonly broker: IBroker,
    private readonly unitOfWork: IUnitOfWork,
  ) {}

  async execute(input: SubmitAnalysisInput): Promise<SubmitAnalysisResult> {
    // Both throw ValidationError before anything is written
    const reference = RepositoryReference.create(input.repositoryReference);
    const parameters = SummaryParameters.create(input.parameters);

    const ownerIdentity = input.ownerIdentity?.trim() || null;
    const job = AnalysisJob.create({
      repositoryReference: reference.value,
      parameters,
      ownerIdentity,
    });

    await this.unitOfWork.run(async () => {
      await this.jobRepo.create(job);
      await this.broker.enqueue(QUEUES.submitted, { id: job.id, repositoryReference: reference.value });
    });

    this.logger.log(`[job ${job.id}] queued ${reference.value}${ownerIdentity ? ` for ${ownerIdentity}` : ''}`);
    return { id: job.id, status: 'queued' };
  }
}
