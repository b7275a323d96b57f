import Database from 'better-sqlite3';
import { AnalysisJob } from '../../../domain/entities/AnalysisJob';
import { SummaryParameters } from '../../../domain/value-objects/SummaryParameters';
import { createTestDatabase } from './database';
import { SqliteAnalysisJobRepository } from './AnalysisJobRepository';

function newJob(ownerIdentity?: string, createdAt?: Date): AnalysisJob {
  return AnalysisJob.reconstitute({
    repositoryReference: 'https://github.com/user/repo',
    parameters: SummaryParameters.create({ language: 'fr', length: 'short' }),
    ownerIdentity,
    createdAt,
  });
}

describe('SqliteAnalysisJobRepository', () => {
  let db: Database.Database;
  let repo: SqliteAnalysisJobRepository;

  beforeEach(() => {
    db = createTestDatabase();
    repo = new SqliteAnalysisJobRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('create and findById', () => {
    it('should store and retrieve a job', async () => {
      const job = newJob('user-1');
      const id = await repo.create(job);

      const found = await repo.findById(id);

      expect(found?.toSnapshot()).toEqual(job.toSnapshot());
      expect(found?.parameters.toJSON()).toEqual({ language: 'fr', length: 'short', technicality: 'intermediate' });
    });

    it('should return null for an unknown id', async () => {
      expect(await repo.findById('missing')).toBeNull();
    });
  });

  describe('update', () => {
    it('should apply a legal transition', async () => {
      const id = await repo.create(newJob());

      const result = await repo.update(id, { status: 'processing' });

      expect(result.outcome).toBe('applied');
      const stored = await repo.findById(id);
      expect(stored?.status.value).toBe('processing');
    });

    it('should store the summary with the completed status', async () => {
      const id = await repo.create(newJob());
      await repo.update(id, { status: 'processing' });
      await repo.update(id, { status: 'analyzing' });

      await repo.update(id, { status: 'completed', summaryContent: '<h2>Overview</h2>' });

      const stored = await repo.findById(id);
      expect(stored?.status.value).toBe('completed');
      expect(stored?.summaryContent).toBe('<h2>Overview</h2>');
      expect(stored?.errorMessage).toBeNull();
    });

    it('should report an illegal transition as stale and leave the row alone', async () => {
      const id = await repo.create(newJob());
      await repo.update(id, { status: 'failed', errorMessage: 'gave up' });

      const result = await repo.update(id, { status: 'processing' });

      expect(result.outcome).toBe('stale');
      if (result.outcome === 'stale') {
        expect(result.reason).toBe(`Job ${id} is failed; cannot move to processing`);
        expect(result.job.status.value).toBe('failed');
      }
      const stored = await repo.findById(id);
      expect(stored?.errorMessage).toBe('gave up');
    });

    it('should report an unknown id as not found', async () => {
      expect(await repo.update('missing', { status: 'processing' })).toEqual({ outcome: 'not_found' });
    });
  });

  describe('findByOwner', () => {
    it('should return only the owner jobs, newest first', async () => {
      const older = newJob('user-1', new Date('2024-01-01T00:00:00.000Z'));
      const newer = newJob('user-1', new Date('2024-02-01T00:00:00.000Z'));
      await repo.create(older);
      await repo.create(newer);
      await repo.create(newJob('user-2'));
      await repo.create(newJob());

      const jobs = await repo.findByOwner('user-1');

      expect(jobs.map((job) => job.id)).toEqual([newer.id, older.id]);
    });

    it('should honour the limit', async () => {
      for (let i = 0; i < 3; i++) {
        await repo.create(newJob('user-1'));
      }

      expect(await repo.findByOwner('user-1', 2)).toHaveLength(2);
    });
  });

  describe('countByOwner', () => {
    it('should count every job of the owner regardless of limit', async () => {
      for (let i = 0; i < 3; i++) {
        await repo.create(newJob('user-1'));
      }
      await repo.create(newJob('user-2'));
      await repo.create(newJob());

      expect(await repo.countByOwner('user-1')).toBe(3);
      expect(await repo.countByOwner('user-3')).toBe(0);
    });
  });

  describe('countByStatus', () => {
    it('should count every status, including empty ones', async () => {
      await repo.create(newJob());
      const id = await repo.create(newJob());
      await repo.update(id, { status: 'processing' });

      expect(await repo.countByStatus()).toEqual({
        queued: 1,
        processing: 1,
        analyzing: 0,
        completed: 0,
        failed: 0,
      });
    });
  });
});
