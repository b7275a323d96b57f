import { Logger } from '@nestjs/common';
import { IBroker, QueueName, ReceivedMessage } from '../../domain/ports/IBroker';
import { MalformedMessageError, describeError } from '../../domain/errors';

export interface QueueWorkerOptions {
  pollIntervalMs?: number;
  /** Number of consumer loops sharing the queue */
  concurrency?: number;
  /** Deliveries after which a message is given up and dead-lettered */
  maxDeliveryAttempts?: number;
  /** Delay before a released message becomes visible again */
  retryDelayMs?: number;
}

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_MAX_DELIVERY_ATTEMPTS = 5;
export const DEFAULT_RETRY_DELAY_MS = 5000;

/**
 * Poll-based consumer of one broker queue.
 *
 * A message is acked once `handle` resolves. A MalformedMessageError drops it;
 * any other error releases it for redelivery. Past the delivery cap the
 * stage's `giveUp` runs and the message is dead-lettered.
 */
export abstract class QueueWorker {
  protected readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly concurrency: number;
  private readonly maxDeliveryAttempts: number;
  private readonly retryDelayMs: number;
  private running = false;
  private loops: Promise<void>[] = [];
  private wakers = new Set<() => void>();

  protected constructor(
    protected readonly broker: IBroker,
    readonly queue: QueueName,
    options: QueueWorkerOptions = {},
  ) {
    this.logger = new Logger(new.target.name);
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.maxDeliveryAttempts = options.maxDeliveryAttempts ?? DEFAULT_MAX_DELIVERY_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  /**
   * Process one message. Throw MalformedMessageError for payloads that can
   * never succeed; any other error means "try again later".
   */
  protected abstract handle(message: ReceivedMessage): Promise<void>;

  /**
   * Stage-specific outcome for a message that keeps failing
   */
  protected async giveUp(message: ReceivedMessage, reason: string): Promise<void> {
    this.logger.warn(`Message ${message.messageId} on ${this.queue}: ${reason}`);
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loops = Array.from({ length: this.concurrency }, () => this.runLoop());
    this.logger.log(`Consuming ${this.queue} with ${this.concurrency} loop(s)`);
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    for (const wake of this.wakers) {
      wake();
    }
    await Promise.all(this.loops);
    this.loops = [];
    this.logger.log(`Stopped consuming ${this.queue}`);
  }

  /**
   * Receive and dispatch one message; resolves false when the queue had none visible
   */
  async processNext(): Promise<boolean> {
    const message = await this.broker.receive(this.queue);
    if (!message) {
      return false;
    }
    await this.dispatch(message);
    return true;
  }

  /**
   * Process until no message is visible; returns how many were dispatched
   */
  async drain(): Promise<number> {
    let processed = 0;
    while (await this.processNext()) {
      processed++;
    }
    return processed;
  }

  private async dispatch(message: ReceivedMessage): Promise<void> {
    if (message.attempts > this.maxDeliveryAttempts) {
      const reason = `gave up after ${this.maxDeliveryAttempts} delivery attempts`;
      try {
        await this.giveUp(message, reason);
      } catch (error) {
        this.logger.error(`Give-up for message ${message.messageId} failed: ${describeError(error)}`);
        await this.broker.release(message.receipt, this.retryDelayMs);
        return;
      }
      await this.broker.deadLetter(message.receipt, reason);
      return;
    }

    try {
      await this.handle(message);
    } catch (error) {
      if (error instanceof MalformedMessageError) {
        this.logger.warn(`Dropping malformed message ${message.messageId} on ${this.queue}: ${error.message}`);
        await this.broker.ack(message.receipt);
        return;
      }
      const stack = error instanceof Error ? error.stack : undefined;
      this.logger.error(
        `Message ${message.messageId} on ${this.queue} failed (attempt ${message.attempts}): ${describeError(error)}`,
        stack,
      );
      await this.broker.release(message.receipt, this.retryDelayMs);
      return;
    }

    await this.broker.ack(message.receipt);
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      let processed = false;
      try {
        processed = await this.processNext();
      } catch (error) {
        this.logger.error(`Polling ${this.queue} failed: ${describeError(error)}`);
      }
      if (!processed && this.running) {
        await this.sleep(this.pollIntervalMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        this.wakers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.wakers.add(wake);
    });
  }
}
