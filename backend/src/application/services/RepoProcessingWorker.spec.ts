import { QUEUES } from '../../domain/ports/IBroker';
import { ExtractionError, FetchError } from '../../domain/errors';
import { createTestPipeline, TestPipeline } from '../../testing/fakes';

describe('RepoProcessingWorker', () => {
  let pipeline: TestPipeline;

  beforeEach(() => {
    pipeline = createTestPipeline();
  });

  afterEach(() => {
    pipeline.db.close();
  });

  const submit = async (): Promise<string> => {
    const { id } = await pipeline.submit.execute({
      repositoryReference: 'https://github.com/user/repo',
      parameters: { technicality: 'beginner' },
    });
    return id;
  };

  it('should extract the repository and hand it to the analysis stage', async () => {
    const id = await submit();

    expect(await pipeline.repoWorker.drain()).toBe(1);

    const job = await pipeline.jobRepo.findById(id);
    expect(job?.status.value).toBe('analyzing');
    expect(pipeline.fetcher.fetched).toEqual(['https://github.com/user/repo']);
    expect(pipeline.fetcher.cleanedUp).toEqual([`/tmp/fake-clone/${id}`]);

    const message = await pipeline.broker.receive(QUEUES.extracted);
    expect(message?.payload).toEqual({
      id,
      extractedContent: '=== README.md ===\n# Demo project',
      parameters: { language: 'en', length: 'medium', technicality: 'beginner' },
    });
    expect(await pipeline.broker.depth(QUEUES.submitted)).toBe(0);
  });

  it('should fail the job when the fetch fails and enqueue nothing downstream', async () => {
    pipeline.fetcher.failure = new FetchError("Repository 'user/repo' not found or access denied");
    const id = await submit();

    await pipeline.repoWorker.drain();

    const job = await pipeline.jobRepo.findById(id);
    expect(job?.status.value).toBe('failed');
    expect(job?.errorMessage).toBe("Repository 'user/repo' not found or access denied");
    expect(await pipeline.broker.depth(QUEUES.extracted)).toBe(0);
    expect(await pipeline.broker.depth(QUEUES.submitted)).toBe(0);
  });

  it('should fail the job and clean up when extraction fails', async () => {
    pipeline.extractor.failure = new ExtractionError('No readable content found in repository');
    const id = await submit();

    await pipeline.repoWorker.drain();

    const job = await pipeline.jobRepo.findById(id);
    expect(job?.errorMessage).toBe('No readable content found in repository');
    expect(pipeline.fetcher.cleanedUp).toHaveLength(1);
  });

  it('should drop a duplicate message for a job that already moved on', async () => {
    const id = await submit();
    await pipeline.repoWorker.drain();
    await pipeline.broker.enqueue(QUEUES.submitted, { id, repositoryReference: 'https://github.com/user/repo' });

    await pipeline.repoWorker.drain();

    expect(pipeline.fetcher.fetched).toHaveLength(1);
    expect(await pipeline.broker.depth(QUEUES.extracted)).toBe(1);
    expect((await pipeline.jobRepo.findById(id))?.status.value).toBe('analyzing');
  });

  it('should resume a job left in processing by an earlier delivery', async () => {
    const id = await submit();
    await pipeline.jobRepo.update(id, { status: 'processing' });

    await pipeline.repoWorker.drain();

    expect((await pipeline.jobRepo.findById(id))?.status.value).toBe('analyzing');
    expect(await pipeline.broker.depth(QUEUES.extracted)).toBe(1);
  });

  it('should drop malformed messages and unknown jobs', async () => {
    await pipeline.broker.enqueue(QUEUES.submitted, { id: '', repositoryReference: 'https://github.com/user/repo' });
    await pipeline.broker.enqueue(QUEUES.submitted, { id: 'missing', repositoryReference: 'https://github.com/user/repo' });

    expect(await pipeline.repoWorker.drain()).toBe(2);

    expect(await pipeline.broker.depth(QUEUES.submitted)).toBe(0);
    expect(await pipeline.broker.deadLetterDepth(QUEUES.submitted)).toBe(0);
    expect(pipeline.fetcher.fetched).toEqual([]);
  });

  it('should fail the job once infrastructure errors exhaust the delivery cap', async () => {
    const id = await submit();
    jest.spyOn(pipeline.unitOfWork, 'run').mockRejectedValue(new Error('disk I/O error'));

    // Five failing deliveries, then the sixth gives up
    expect(await pipeline.repoWorker.drain()).toBe(6);

    const job = await pipeline.jobRepo.findById(id);
    expect(job?.status.value).toBe('failed');
    expect(job?.errorMessage).toBe('Repository processing gave up after 5 delivery attempts');
    expect(await pipeline.broker.depth(QUEUES.submitted)).toBe(0);
    expect(await pipeline.broker.deadLetterDepth(QUEUES.submitted)).toBe(1);
  });
});
