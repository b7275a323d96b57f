import { AnalysisJob, JobTransition } from '../entities/AnalysisJob';
import { JobStatusValue } from '../value-objects/JobStatus';

export type UpdateResult =
  | { outcome: 'applied'; job: AnalysisJob }
  | { outcome: 'stale'; job: AnalysisJob; reason: string }
  | { outcome: 'not_found' };

/**
 * Repository interface (port) for the status store.
 *
 * `update` is atomic with respect to concurrent readers. A transition the
 * current state does not allow (including anything on a terminal job) is a
 * no-op reported as `stale`.
 */
export interface IAnalysisJobRepository {
  create(job: AnalysisJob): Promise<string>;
  findById(id: string): Promise<AnalysisJob | null>;
  update(id: string, transition: JobTransition): Promise<UpdateResult>;
  findByOwner(ownerIdentity: string, limit?: number): Promise<AnalysisJob[]>;
  countByOwner(ownerIdentity: string): Promise<number>;
  countByStatus(): Promise<Record<JobStatusValue, number>>;
}

export const DEFAULT_HISTORY_LIMIT = 50;

export const ANALYSIS_JOB_REPOSITORY = Symbol('IAnalysisJobRepository');
