import type { AnalysisStatus } from '@repo-digest/shared';

/**
 * Value Object representing the status of an analysis job
 * Implements the pipeline state machine
 */
export type JobStatusValue = AnalysisStatus;

const TRANSITIONS: Record<JobStatusValue, readonly JobStatusValue[]> = {
  // queued -> failed only happens when the stage-1 message runs out of deliveries
  queued: ['processing', 'failed'],
  processing: ['analyzing', 'failed'],
  analyzing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export const JOB_STATUS_VALUES: readonly JobStatusValue[] = ['queued', 'processing', 'analyzing', 'completed', 'failed'];

export class JobStatus {
  private readonly _value: JobStatusValue;

  private constructor(value: JobStatusValue) {
    this._value = value;
  }

  static queued(): JobStatus {
    return new JobStatus('queued');
  }

  static processing(): JobStatus {
    return new JobStatus('processing');
  }

  static analyzing(): JobStatus {
    return new JobStatus('analyzing');
  }

  static completed(): JobStatus {
    return new JobStatus('completed');
  }

  static failed(): JobStatus {
    return new JobStatus('failed');
  }

  static fromString(value: string): JobStatus {
    const match = JOB_STATUS_VALUES.find((status) => status === value);
    if (!match) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatus(match);
  }

  get value(): JobStatusValue {
    return this._value;
  }

  get isQueued(): boolean {
    return this._value === 'queued';
  }

  get isProcessing(): boolean {
    return this._value === 'processing';
  }

  get isAnalyzing(): boolean {
    return this._value === 'analyzing';
  }

  get isCompleted(): boolean {
    return this._value === 'completed';
  }

  get isFailed(): boolean {
    return this._value === 'failed';
  }

  get isTerminal(): boolean {
    return this._value === 'completed' || this._value === 'failed';
  }

  canTransitionTo(newStatus: JobStatus): boolean {
    return TRANSITIONS[this._value].includes(newStatus._value);
  }

  equals(other: JobStatus): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
