import Database from 'better-sqlite3';
import { AnalysisJob } from '../../../domain/entities/AnalysisJob';
import { SummaryParameters } from '../../../domain/value-objects/SummaryParameters';
import { QUEUES } from '../../../domain/ports/IBroker';
import { SqliteBroker } from '../../queue/SqliteBroker';
import { createTestDatabase } from './database';
import { SqliteAnalysisJobRepository } from './AnalysisJobRepository';
import { SqliteUnitOfWork } from './SqliteUnitOfWork';

describe('SqliteUnitOfWork', () => {
  let db: Database.Database;
  let repo: SqliteAnalysisJobRepository;
  let broker: SqliteBroker;
  let unitOfWork: SqliteUnitOfWork;

  beforeEach(() => {
    db = createTestDatabase();
    repo = new SqliteAnalysisJobRepository(db);
    broker = new SqliteBroker(db);
    unitOfWork = new SqliteUnitOfWork(db);
  });

  afterEach(() => {
    db.close();
  });

  function newJob(): AnalysisJob {
    return AnalysisJob.create({
      repositoryReference: 'https://github.com/user/repo',
      parameters: SummaryParameters.defaults(),
    });
  }

  it('should commit the job and its message together', async () => {
    const job = newJob();

    const id = await unitOfWork.run(async () => {
      const created = await repo.create(job);
      await broker.enqueue(QUEUES.submitted, { id: created, repositoryReference: job.repositoryReference });
      return created;
    });

    expect(id).toBe(job.id);
    expect(await repo.findById(id)).not.toBeNull();
    expect(await broker.depth(QUEUES.submitted)).toBe(1);
  });

  it('should roll back both writes when the work throws', async () => {
    const job = newJob();

    await expect(
      unitOfWork.run(async () => {
        await repo.create(job);
        throw new Error('broker unavailable');
      }),
    ).rejects.toThrow('broker unavailable');

    expect(await repo.findById(job.id)).toBeNull();
    expect(await broker.depth(QUEUES.submitted)).toBe(0);
    expect(db.inTransaction).toBe(false);
  });

  it('should run overlapping units one after the other', async () => {
    const first = newJob();
    const second = newJob();

    await Promise.all([
      unitOfWork.run(async () => repo.create(first)),
      unitOfWork.run(async () => repo.create(second)),
    ]);

    expect(await repo.findById(first.id)).not.toBeNull();
    expect(await repo.findById(second.id)).not.toBeNull();
  });

  it('should keep working after a failed unit', async () => {
    const job = newJob();
    const failed = unitOfWork.run(async () => {
      throw new Error('first unit fails');
    });
    const succeeded = unitOfWork.run(async () => repo.create(job));

    await expect(failed).rejects.toThrow('first unit fails');
    await expect(succeeded).resolves.toBe(job.id);
  });
});
