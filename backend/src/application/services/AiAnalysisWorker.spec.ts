import { QUEUES } from '../../domain/ports/IBroker';
import { AnalysisError } from '../../domain/errors';
import { createTestPipeline, TestPipeline } from '../../testing/fakes';

describe('AiAnalysisWorker', () => {
  let pipeline: TestPipeline;

  afterEach(() => {
    pipeline.db.close();
  });

  const submitAndExtract = async (): Promise<string> => {
    const { id } = await pipeline.submit.execute({
      repositoryReference: 'https://github.com/user/repo',
      parameters: { language: 'ja', length: 'long' },
    });
    await pipeline.repoWorker.drain();
    return id;
  };

  describe('with the default timeout', () => {
    beforeEach(() => {
      pipeline = createTestPipeline();
    });

    it('should publish a completed result without touching the job', async () => {
      const id = await submitAndExtract();

      expect(await pipeline.aiWorker.drain()).toBe(1);

      expect(pipeline.summarizer.calls).toEqual([
        {
          content: '=== README.md ===\n# Demo project',
          parameters: { language: 'ja', length: 'long', technicality: 'intermediate' },
        },
      ]);
      const result = await pipeline.broker.receive(QUEUES.results);
      expect(result?.payload).toEqual({
        id,
        status: 'completed',
        summaryContent: '<h2>Overview</h2><p>A demo project.</p>',
      });
      expect((await pipeline.jobRepo.findById(id))?.status.value).toBe('analyzing');
    });

    it('should publish a failed result when the summarizer fails', async () => {
      pipeline.summarizer.failure = new AnalysisError('GEMINI_API_KEY is not configured');
      const id = await submitAndExtract();

      await pipeline.aiWorker.drain();

      const result = await pipeline.broker.receive(QUEUES.results);
      expect(result?.payload).toEqual({ id, status: 'failed', errorMessage: 'GEMINI_API_KEY is not configured' });
    });

    const runToEnd = async (): Promise<void> => {
      await pipeline.aiWorker.drain();
      await pipeline.resultConsumer.drain();
    };

    it('should fail the job when the summarizer returns an empty summary', async () => {
      pipeline.summarizer.summary = '';
      const id = await submitAndExtract();

      await runToEnd();

      const job = await pipeline.jobRepo.findById(id);
      expect(job?.status.value).toBe('failed');
      expect(job?.errorMessage).toBe('Summarizer gemini returned an empty summary');
      expect(job?.summaryContent).toBeNull();
    });

    it('should fail the job when the summary is only whitespace', async () => {
      pipeline.summarizer.summary = '   ';
      const id = await submitAndExtract();

      await runToEnd();

      const job = await pipeline.jobRepo.findById(id);
      expect(job?.status.value).toBe('failed');
      expect(job?.errorMessage).toBe('Summarizer gemini returned an empty summary');
      expect(await pipeline.broker.deadLetterDepth(QUEUES.results)).toBe(0);
    });

    it('should fail the job with a fallback message when the error has none', async () => {
      pipeline.summarizer.failure = new Error('');
      const id = await submitAndExtract();

      await runToEnd();

      const job = await pipeline.jobRepo.findById(id);
      expect(job?.status.value).toBe('failed');
      expect(job?.errorMessage).toBe('Unknown error');
    });

    it('should drop a request for a job that is already terminal', async () => {
      const id = await submitAndExtract();
      await pipeline.jobRepo.update(id, { status: 'failed', errorMessage: 'gave up' });

      await pipeline.aiWorker.drain();

      expect(pipeline.summarizer.calls).toHaveLength(0);
      expect(await pipeline.broker.depth(QUEUES.results)).toBe(0);
    });

    it('should drop a request for an unknown job', async () => {
      await pipeline.broker.enqueue(QUEUES.extracted, {
        id: 'missing',
        extractedContent: 'README',
        parameters: { language: 'en', length: 'short', technicality: 'expert' },
      });

      expect(await pipeline.aiWorker.drain()).toBe(1);

      expect(pipeline.summarizer.calls).toHaveLength(0);
      expect(await pipeline.broker.depth(QUEUES.extracted)).toBe(0);
    });

    it('should publish a failed result once the delivery cap is exhausted', async () => {
      const id = await submitAndExtract();
      jest.spyOn(pipeline.broker, 'enqueue').mockRejectedValueOnce(new Error('database is locked'));
      // First delivery fails to publish; pretend the next four did too
      await pipeline.aiWorker.processNext();
      pipeline.db.prepare('UPDATE queue_messages SET attempts = 5 WHERE queue = ?').run(QUEUES.extracted);

      await pipeline.aiWorker.drain();

      const result = await pipeline.broker.receive(QUEUES.results);
      expect(result?.payload).toEqual({
        id,
        status: 'failed',
        errorMessage: 'Summarization gave up after 5 delivery attempts',
      });
      expect(await pipeline.broker.deadLetterDepth(QUEUES.extracted)).toBe(1);
    });
  });

  it('should publish a failed result when the summarizer times out', async () => {
    pipeline = createTestPipeline({ analysisTimeoutMs: 20 });
    pipeline.summarizer.hang = true;
    const id = await submitAndExtract();

    await pipeline.aiWorker.drain();

    const result = await pipeline.broker.receive(QUEUES.results);
    expect(result?.payload).toEqual({ id, status: 'failed', errorMessage: 'Summarization timed out after 20ms' });
  });
});
