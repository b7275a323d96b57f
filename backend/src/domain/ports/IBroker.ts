import { SummaryParametersValue } from '../value-objects/SummaryParameters';

/**
 * Port for the message broker connecting the pipeline stages.
 * Delivery is at-least-once; consumers must be idempotent per job id.
 */

export const QUEUES = {
  submitted: 'submitted-jobs',
  extracted: 'extracted-content',
  results: 'completed-results',
} as const;

export type QueueName = (typeof QUEUES)[keyof typeof QUEUES];

export const QUEUE_NAMES: readonly QueueName[] = [QUEUES.submitted, QUEUES.extracted, QUEUES.results];

export interface SubmittedJobMessage {
  id: string;
  repositoryReference: string;
}

export interface ExtractedContentMessage {
  id: string;
  extractedContent: string;
  parameters: SummaryParametersValue;
}

export type ResultMessage =
  | { id: string; status: 'completed'; summaryContent: string }
  | { id: string; status: 'failed'; errorMessage: string };

export interface QueuePayloads {
  'submitted-jobs': SubmittedJobMessage;
  'extracted-content': ExtractedContentMessage;
  'completed-results': ResultMessage;
}

export interface ReceivedMessage {
  /** Lease token; only the current holder can ack or release the message */
  receipt: string;
  messageId: number;
  queue: QueueName;
  /** Untrusted until validated by the consuming stage */
  payload: unknown;
  /** Number of times the message has been handed out, this delivery included */
  attempts: number;
  enqueuedAt: Date;
}

export interface IBroker {
  enqueue<Q extends QueueName>(queue: Q, payload: QueuePayloads[Q]): Promise<void>;

  /**
   * Lease the oldest visible message; it stays invisible to other consumers
   * until acked, released, or its visibility timeout passes.
   */
  receive(queue: QueueName): Promise<ReceivedMessage | null>;

  ack(receipt: string): Promise<void>;

  release(receipt: string, delayMs?: number): Promise<void>;

  deadLetter(receipt: string, reason: string): Promise<void>;

  depth(queue: QueueName): Promise<number>;

  deadLetterDepth(queue: QueueName): Promise<number>;
}

export const BROKER = Symbol('IBroker');
