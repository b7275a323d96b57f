/**
 * Error taxonomy of the analysis pipeline.
 *
 * Only ValidationError reaches the submitting client synchronously. Fetch,
 * extraction and analysis errors end up as the job's error message, while
 * malformed and stale messages are logged by the worker and dropped.
 */
export abstract class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Client input rejected before any job exists */
export class ValidationError extends PipelineError {}

/** Repository unreachable, too large, or the clone timed out */
export class FetchError extends PipelineError {}

/** Repository fetched but nothing readable could be extracted */
export class ExtractionError extends PipelineError {}

/** Summarization failed, timed out or returned nothing */
export class AnalysisError extends PipelineError {}

/** Queue payload that cannot be resolved to a job */
export class MalformedMessageError extends PipelineError {}

/** A transition was requested that the job's current state does not allow */
export class StaleTransitionError extends PipelineError {
  constructor(
    readonly jobId: string,
    readonly currentStatus: string,
    readonly requestedStatus: string,
  ) {
    super(`Job ${jobId} is ${currentStatus}; cannot move to ${requestedStatus}`);
  }
}

export class JobNotFoundError extends PipelineError {
  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
