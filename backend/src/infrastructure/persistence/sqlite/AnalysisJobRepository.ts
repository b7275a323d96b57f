import Database from 'better-sqlite3';
import { AnalysisJob, JobTransition } from '../../../domain/entities/AnalysisJob';
import { DEFAULT_HISTORY_LIMIT, IAnalysisJobRepository, UpdateResult } from '../../../domain/repositories/IAnalysisJobRepository';
import { JOB_STATUS_VALUES, JobStatus, JobStatusValue } from '../../../domain/value-objects/JobStatus';
import { SummaryParameters, SummaryParametersInput } from '../../../domain/value-objects/SummaryParameters';
import { StaleTransitionError } from '../../../domain/errors';
import { getDatabase } from './database';

interface AnalysisJobRow {
  id: string;
  repository_reference: string;
  parameters: string;
  owner_identity: string | null;
  status: string;
  summary_content: string | null;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

interface StatusCountRow {
  status: string;
  count: number;
}

export class SqliteAnalysisJobRepository implements IAnalysisJobRepository {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db || getDatabase();
  }

  async create(job: AnalysisJob): Promise<string> {
    const snapshot = job.toSnapshot();
    this.db
      .prepare(
        `INSERT INTO analysis_jobs (id, repository_reference, parameters, owner_identity, status, summary_content, error_message, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        snapshot.id,
        snapshot.repositoryReference,
        JSON.stringify(snapshot.parameters),
        snapshot.ownerIdentity,
        snapshot.status,
        snapshot.summaryContent,
        snapshot.errorMessage,
        snapshot.createdAt.toISOString(),
        snapshot.updatedAt.toISOString(),
      );
    return snapshot.id;
  }

  async findById(id: string): Promise<AnalysisJob | null> {
    const row = this.selectById(id);
    return row ? this.mapToEntity(row) : null;
  }

  async update(id: string, transition: JobTransition): Promise<UpdateResult> {
    // Read-check-write in one transaction so concurrent stages see either the
    // old row or the new one, never a mix
    const apply = this.db.transaction((): UpdateResult => {
      const row = this.selectById(id);
      if (!row) {
        return { outcome: 'not_found' };
      }

      const job = this.mapToEntity(row);
      try {
        job.apply(transition);
      } catch (error) {
        if (error instanceof StaleTransitionError) {
          return { outcome: 'stale', job, reason: error.message };
        }
        throw error;
      }

      const snapshot = job.toSnapshot();
      this.db
        .prepare(
          `UPDATE analysis_jobs
           SET status = ?, summary_content = ?, error_message = ?, updated_at = ?
           WHERE id = ?`,
        )
        .run(snapshot.status, snapshot.summaryContent, snapshot.errorMessage, snapshot.updatedAt.toISOString(), id);

      return { outcome: 'applied', job };
    });

    return apply.immediate();
  }

  async findByOwner(ownerIdentity: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<AnalysisJob[]> {
    const rows = this.db
      .prepare<[string, number], AnalysisJobRow>(
        `SELECT * FROM analysis_jobs
         WHERE owner_identity = ?
         ORDER BY created_at DESC, rowid DESC
         LIMIT ?`,
      )
      .all(ownerIdentity, limit);
    return rows.map((row) => this.mapToEntity(row));
  }

  async countByOwner(ownerIdentity: string): Promise<number> {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM analysis_jobs WHERE owner_identity = ?')
      .get(ownerIdentity);
    return row?.count ?? 0;
  }

  async countByStatus(): Promise<Record<JobStatusValue, number>> {
    const counts: Record<JobStatusValue, number> = {
      queued: 0,
      processing: 0,
      analyzing: 0,
      completed: 0,
      failed: 0,
    };
    const rows = this.db
      .prepare<[], StatusCountRow>('SELECT status, COUNT(*) AS count FROM analysis_jobs GROUP BY status')
      .all();
    for (const row of rows) {
      const status = JOB_STATUS_VALUES.find((value) => value === row.status);
      if (status) {
        counts[status] = row.count;
      }
    }
    return counts;
  }

  private selectById(id: string): AnalysisJobRow | undefined {
    return this.db.prepare<[string], AnalysisJobRow>('SELECT * FROM analysis_jobs WHERE id = ?').get(id);
  }

  private mapToEntity(row: AnalysisJobRow): AnalysisJob {
    return AnalysisJob.reconstitute({
      id: row.id,
      repositoryReference: row.repository_reference,
      parameters: SummaryParameters.create(parseParameters(row.parameters)),
      ownerIdentity: row.owner_identity,
      status: JobStatus.fromString(row.status),
      summaryContent: row.summary_content,
      errorMessage: row.error_message,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    });
  }
}

function parseParameters(raw: string): SummaryParametersInput {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    return {};
  }
  const input: SummaryParametersInput = {};
  for (const key of ['language', 'length', 'technicality'] as const) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === 'string') {
      input[key] = value;
    }
  }
  return input;
}
