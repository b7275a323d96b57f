import { QUEUES } from '../../domain/ports/IBroker';
import { FetchError } from '../../domain/errors';
import { createTestPipeline, TestPipeline } from '../../testing/fakes';
import { GetAnalysisStatusQuery } from '../queries/GetAnalysisStatus';

describe('analysis pipeline', () => {
  let pipeline: TestPipeline;
  let appliedStatuses: string[];

  beforeEach(() => {
    pipeline = createTestPipeline({ pollIntervalMs: 5 });
    appliedStatuses = [];
    const update = pipeline.jobRepo.update.bind(pipeline.jobRepo);
    jest.spyOn(pipeline.jobRepo, 'update').mockImplementation(async (id, transition) => {
      const result = await update(id, transition);
      if (result.outcome === 'applied') {
        appliedStatuses.push(result.job.status.value);
      }
      return result;
    });
  });

  afterEach(() => {
    pipeline.db.close();
  });

  const drainAll = async (): Promise<void> => {
    await pipeline.repoWorker.drain();
    await pipeline.aiWorker.drain();
    await pipeline.resultConsumer.drain();
  };

  it('should take a job from queued to completed', async () => {
    const { id } = await pipeline.submit.execute({ repositoryReference: 'https://github.com/user/repo' });
    expect((await pipeline.jobRepo.findById(id))?.status.value).toBe('queued');

    await drainAll();

    const job = await pipeline.jobRepo.findById(id);
    expect(appliedStatuses).toEqual(['processing', 'analyzing', 'completed']);
    expect(job?.summaryContent).toBe('<h2>Overview</h2><p>A demo project.</p>');
    expect(job?.errorMessage).toBeNull();
    for (const queue of [QUEUES.submitted, QUEUES.extracted, QUEUES.results]) {
      expect(await pipeline.broker.depth(queue)).toBe(0);
    }
  });

  it('should end a job whose repository cannot be fetched as failed', async () => {
    pipeline.fetcher.failure = new FetchError("Failed to clone repository 'user/missing'. Repository not found or access denied.");
    const { id } = await pipeline.submit.execute({ repositoryReference: 'https://github.com/user/missing' });

    await pipeline.repoWorker.drain();
    expect(await pipeline.broker.depth(QUEUES.extracted)).toBe(0);
    await drainAll();

    const job = await pipeline.jobRepo.findById(id);
    expect(appliedStatuses).toEqual(['processing', 'failed']);
    expect(job?.errorMessage).toBe("Failed to clone repository 'user/missing'. Repository not found or access denied.");
    expect(job?.summaryContent).toBeNull();
    expect(pipeline.summarizer.calls).toHaveLength(0);
  });

  it('should never move a terminal job when stages redeliver', async () => {
    const { id } = await pipeline.submit.execute({ repositoryReference: 'https://github.com/user/repo' });
    await drainAll();

    await pipeline.broker.enqueue(QUEUES.submitted, { id, repositoryReference: 'https://github.com/user/repo' });
    await pipeline.broker.enqueue(QUEUES.extracted, {
      id,
      extractedContent: 'README',
      parameters: { language: 'en', length: 'medium', technicality: 'intermediate' },
    });
    await pipeline.broker.enqueue(QUEUES.results, { id, status: 'failed', errorMessage: 'late' });
    await drainAll();

    const job = await pipeline.jobRepo.findById(id);
    expect(job?.status.value).toBe('completed');
    expect(job?.errorMessage).toBeNull();
    expect(appliedStatuses).toEqual(['processing', 'analyzing', 'completed']);
  });

  it('should keep each owner history separate', async () => {
    const first = await pipeline.submit.execute({ repositoryReference: 'https://github.com/a/one', ownerIdentity: 'user-a' });
    const second = await pipeline.submit.execute({ repositoryReference: 'https://github.com/b/two', ownerIdentity: 'user-b' });
    await drainAll();
    const query = new GetAnalysisStatusQuery(pipeline.jobRepo);

    const historyA = await query.listHistory('user-a');
    const historyB = await query.listHistory('user-b');

    expect(historyA.items.map((item) => item.id)).toEqual([first.id]);
    expect(historyB.items.map((item) => item.id)).toEqual([second.id]);
    await expect(query.getHistoryItem('user-a', second.id)).rejects.toThrow(`Job not found: ${second.id}`);
  });

  it('should run every stage from background loops', async () => {
    const workers = [pipeline.repoWorker, pipeline.aiWorker, pipeline.resultConsumer];
    workers.forEach((worker) => worker.start());

    try {
      const { id } = await pipeline.submit.execute({ repositoryReference: 'https://github.com/user/repo' });
      let status = 'queued';
      for (let i = 0; i < 200 && status !== 'completed'; i++) {
        await new Promise((resolve) => setTimeout(resolve, 5));
        status = (await pipeline.jobRepo.findById(id))?.status.value ?? 'missing';
      }
      expect(status).toBe('completed');
    } finally {
      await Promise.all(workers.map((worker) => worker.stop()));
    }
  });
});
