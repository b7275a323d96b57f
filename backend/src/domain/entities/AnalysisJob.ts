import { v4 as uuidv4 } from 'uuid';
import { JobStatus } from '../value-objects/JobStatus';
import { SummaryParameters, SummaryParametersValue } from '../value-objects/SummaryParameters';
import { StaleTransitionError, ValidationError } from '../errors';

export const MAX_ERROR_MESSAGE_LENGTH = 1000;

/**
 * Field changes a pipeline stage may request for a job.
 * Each variant maps to one edge of the state machine.
 */
export type JobTransition =
  | { status: 'processing' }
  | { status: 'analyzing' }
  | { status: 'completed'; summaryContent: string }
  | { status: 'failed'; errorMessage: string };

export interface AnalysisJobProps {
  id?: string;
  repositoryReference: string;
  parameters: SummaryParameters;
  ownerIdentity?: string | null;
  status?: JobStatus;
  summaryContent?: string | null;
  errorMessage?: string | null;
  createdAt?: Date;
  updatedAt?: Date;
}

export interface AnalysisJobSnapshot {
  id: string;
  status: JobStatus['value'];
  repositoryReference: string;
  parameters: SummaryParametersValue;
  ownerIdentity: string | null;
  summaryContent: string | null;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Entity representing one request to summarize a repository.
 * The id is the correlation key carried by every queue message.
 */
export class AnalysisJob {
  private readonly _id: string;
  private readonly _repositoryReference: string;
  private readonly _parameters: SummaryParameters;
  private readonly _ownerIdentity: string | null;
  private _status: JobStatus;
  private _summaryContent: string | null;
  private _errorMessage: string | null;
  private readonly _createdAt: Date;
  private _updatedAt: Date;

  private constructor(props: AnalysisJobProps) {
    this._id = props.id || uuidv4();
    this._repositoryReference = props.repositoryReference;
    this._parameters = props.parameters;
    this._ownerIdentity = props.ownerIdentity || null;
    this._status = props.status || JobStatus.queued();
    this._summaryContent = props.summaryContent || null;
    this._errorMessage = props.errorMessage || null;
    this._createdAt = props.createdAt || new Date();
    this._updatedAt = props.updatedAt || this._createdAt;
  }

  static create(props: Pick<AnalysisJobProps, 'repositoryReference' | 'parameters' | 'ownerIdentity'>): AnalysisJob {
    return new AnalysisJob(props);
  }

  static reconstitute(props: AnalysisJobProps): AnalysisJob {
    return new AnalysisJob(props);
  }

  get id(): string {
    return this._id;
  }

  get repositoryReference(): string {
    return this._repositoryReference;
  }

  get parameters(): SummaryParameters {
    return this._parameters;
  }

  get ownerIdentity(): string | null {
    return this._ownerIdentity;
  }

  get status(): JobStatus {
    return this._status;
  }

  get summaryContent(): string | null {
    return this._summaryContent;
  }

  get errorMessage(): string | null {
    return this._errorMessage;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get isTerminal(): boolean {
    return this._status.isTerminal;
  }

  isOwnedBy(ownerIdentity: string): boolean {
    return this._ownerIdentity === ownerIdentity;
  }

  startProcessing(): void {
    this.transitionTo(JobStatus.processing());
  }

  beginAnalysis(): void {
    this.transitionTo(JobStatus.analyzing());
  }

  complete(summaryContent: string): void {
    if (!summaryContent || summaryContent.trim() === '') {
      throw new ValidationError('Summary content cannot be empty');
    }
    this.transitionTo(JobStatus.completed());
    this._summaryContent = summaryContent;
  }

  fail(errorMessage: string): void {
    const message = errorMessage && errorMessage.trim() !== '' ? errorMessage.trim() : 'Unknown error';
    this.transitionTo(JobStatus.failed());
    this._errorMessage = message.slice(0, MAX_ERROR_MESSAGE_LENGTH);
  }

  apply(transition: JobTransition): void {
    switch (transition.status) {
      case 'processing':
        return this.startProcessing();
      case 'analyzing':
        return this.beginAnalysis();
      case 'completed':
        return this.complete(transition.summaryContent);
      case 'failed':
        return this.fail(transition.errorMessage);
    }
  }

  toSnapshot(): AnalysisJobSnapshot {
    return {
      id: this._id,
      status: this._status.value,
      repositoryReference: this._repositoryReference,
      parameters: this._parameters.toJSON(),
      ownerIdentity: this._ownerIdentity,
      summaryContent: this._summaryContent,
      errorMessage: this._errorMessage,
      createdAt: this._createdAt,
      updatedAt: this._updatedAt,
    };
  }

  equals(other: AnalysisJob): boolean {
    return this._id === other._id;
  }

  private transitionTo(next: JobStatus): void {
    if (!this._status.canTransitionTo(next)) {
      throw new StaleTransitionError(this._id, this._status.value, next.value);
    }
    this._status = next;
    // updatedAt never moves backwards, even if the clock does
    const now = Date.now();
    this._updatedAt = new Date(Math.max(now, this._updatedAt.getTime()));
  }
}
