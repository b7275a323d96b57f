import { QUEUES } from '../../domain/ports/IBroker';
import { ValidationError } from '../../domain/errors';
import { createTestPipeline, TestPipeline } from '../../testing/fakes';

describe('SubmitAnalysisCommand', () => {
  let pipeline: TestPipeline;

  beforeEach(() => {
    pipeline = createTestPipeline();
  });

  afterEach(() => {
    pipeline.db.close();
  });

  it('should create a queued job and its stage-1 message', async () => {
    const result = await pipeline.submit.execute({
      repositoryReference: ' https://github.com/user/repo ',
      parameters: { language: 'es' },
    });

    expect(result.status).toBe('queued');
    const job = await pipeline.jobRepo.findById(result.id);
    expect(job?.status.value).toBe('queued');
    expect(job?.repositoryReference).toBe('https://github.com/user/repo');
    expect(job?.parameters.toJSON()).toEqual({ language: 'es', length: 'medium', technicality: 'intermediate' });

    const message = await pipeline.broker.receive(QUEUES.submitted);
    expect(message?.payload).toEqual({ id: result.id, repositoryReference: 'https://github.com/user/repo' });
  });

  it('should record a trimmed owner identity', async () => {
    const result = await pipeline.submit.execute({
      repositoryReference: 'https://github.com/user/repo',
      ownerIdentity: '  user-1 ',
    });

    const job = await pipeline.jobRepo.findById(result.id);
    expect(job?.ownerIdentity).toBe('user-1');
  });

  it('should treat a blank owner identity as a guest', async () => {
    const result = await pipeline.submit.execute({
      repositoryReference: 'https://github.com/user/repo',
      ownerIdentity: '   ',
    });

    const job = await pipeline.jobRepo.findById(result.id);
    expect(job?.ownerIdentity).toBeNull();
  });

  it('should reject an empty reference without writing anything', async () => {
    await expect(pipeline.submit.execute({ repositoryReference: '' })).rejects.toThrow(ValidationError);

    expect(await pipeline.jobRepo.countByStatus()).toEqual({
      queued: 0,
      processing: 0,
      analyzing: 0,
      completed: 0,
      failed: 0,
    });
    expect(await pipeline.broker.depth(QUEUES.submitted)).toBe(0);
  });

  it('should reject unknown parameter values', async () => {
    await expect(
      pipeline.submit.execute({
        repositoryReference: 'https://github.com/user/repo',
        parameters: { length: 'epic' },
      }),
    ).rejects.toThrow('Invalid length "epic". Expected one of: short, medium, long');

    expect(await pipeline.broker.depth(QUEUES.submitted)).toBe(0);
  });

  it('should not keep the job when the enqueue fails', async () => {
    jest.spyOn(pipeline.broker, 'enqueue').mockRejectedValueOnce(new Error('database is locked'));

    await expect(
      pipeline.submit.execute({ repositoryReference: 'https://github.com/user/repo', ownerIdentity: 'user-1' }),
    ).rejects.toThrow('database is locked');

    expect(await pipeline.jobRepo.findByOwner('user-1')).toEqual([]);
  });
});
