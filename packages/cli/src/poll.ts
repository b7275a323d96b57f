import type { AnalysisJobDto } from '@repo-digest/shared';

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  onUpdate?: (job: AnalysisJobDto) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class PollTimeoutError extends Error {
  constructor(readonly lastJob: AnalysisJobDto, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for job ${lastJob.id} (last status: ${lastJob.status})`);
    this.name = 'PollTimeoutError';
  }
}

export function isTerminalStatus(status: AnalysisJobDto['status']): boolean {
  return status === 'completed' || status === 'failed';
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Poll a job until it reaches completed or failed
 */
export async function waitForTerminalStatus(
  fetchJob: () => Promise<AnalysisJobDto>,
  options: PollOptions,
): Promise<AnalysisJobDto> {
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const startedAt = now();

  let job = await fetchJob();
  options.onUpdate?.(job);

  while (!isTerminalStatus(job.status)) {
    if (now() - startedAt >= options.timeoutMs) {
      throw new PollTimeoutError(job, options.timeoutMs);
    }
    await sleep(options.intervalMs);
    job = await fetchJob();
    options.onUpdate?.(job);
  }

  return job;
}
