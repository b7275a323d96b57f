import Database from 'better-sqlite3';
import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  IBroker,
  QueueName,
  QueuePayloads,
  ReceivedMessage,
} from '../../domain/ports/IBroker';
import { getDatabase } from '../persistence/sqlite/database';

interface QueueMessageRow {
  id: number;
  queue: string;
  payload: string;
  attempts: number;
  visible_at: number;
  receipt: string | null;
  enqueued_at: number;
}

interface CountRow {
  count: number;
}

export interface SqliteBrokerOptions {
  /** How long a received message stays hidden before it is handed out again */
  visibilityTimeoutMs?: number;
  now?: () => number;
}

export const DEFAULT_VISIBILITY_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * Durable at-least-once queues stored beside the job table.
 *
 * A received message is leased under a fresh receipt. Acking deletes it;
 * releasing or letting the lease expire makes it visible again with its
 * attempts counter kept.
 */
export class SqliteBroker implements IBroker {
  private readonly logger = new Logger(SqliteBroker.name);
  private db: Database.Database;
  private readonly visibilityTimeoutMs: number;
  private readonly now: () => number;

  constructor(db?: Database.Database, options: SqliteBrokerOptions = {}) {
    this.db = db || getDatabase();
    this.visibilityTimeoutMs = options.visibilityTimeoutMs ?? DEFAULT_VISIBILITY_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  async enqueue<Q extends QueueName>(queue: Q, payload: QueuePayloads[Q]): Promise<void> {
    const now = this.now();
    this.db
      .prepare('INSERT INTO queue_messages (queue, payload, attempts, visible_at, enqueued_at) VALUES (?, ?, 0, ?, ?)')
      .run(queue, JSON.stringify(payload), now, now);
  }

  async receive(queue: QueueName): Promise<ReceivedMessage | null> {
    const lease = this.db.transaction((): ReceivedMessage | null => {
      const now = this.now();
      const row = this.db
        .prepare<[string, number], QueueMessageRow>(
          `SELECT * FROM queue_messages
           WHERE queue = ? AND visible_at <= ?
           ORDER BY visible_at ASC, id ASC
           LIMIT 1`,
        )
        .get(queue, now);
      if (!row) {
        return null;
      }

      const receipt = uuidv4();
      const attempts = row.attempts + 1;
      this.db
        .prepare('UPDATE queue_messages SET receipt = ?, attempts = ?, visible_at = ? WHERE id = ?')
        .run(receipt, attempts, now + this.visibilityTimeoutMs, row.id);

      return {
        receipt,
        messageId: row.id,
        queue,
        payload: parsePayload(row.payload),
        attempts,
        enqueuedAt: new Date(row.enqueued_at),
      };
    });

    return lease.immediate();
  }

  async ack(receipt: string): Promise<void> {
    const result = this.db.prepare('DELETE FROM queue_messages WHERE receipt = ?').run(receipt);
    if (result.changes === 0) {
      this.logger.warn(`Ack for expired lease ${receipt}; the message may be delivered again`);
    }
  }

  async release(receipt: string, delayMs: number = 0): Promise<void> {
    this.db
      .prepare('UPDATE queue_messages SET receipt = NULL, visible_at = ? WHERE receipt = ?')
      .run(this.now() + Math.max(0, delayMs), receipt);
  }

  async deadLetter(receipt: string, reason: string): Promise<void> {
    const move = this.db.transaction(() => {
      const row = this.db
        .prepare<[string], QueueMessageRow>('SELECT * FROM queue_messages WHERE receipt = ?')
        .get(receipt);
      if (!row) {
        this.logger.warn(`Dead-letter for expired lease ${receipt} ignored`);
        return;
      }
      this.db
        .prepare(
          `INSERT INTO dead_letter_messages (message_id, queue, payload, attempts, reason, enqueued_at, dead_lettered_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(row.id, row.queue, row.payload, row.attempts, reason, row.enqueued_at, this.now());
      this.db.prepare('DELETE FROM queue_messages WHERE id = ?').run(row.id);
    });

    move.immediate();
  }

  async depth(queue: QueueName): Promise<number> {
    return this.count('SELECT COUNT(*) AS count FROM queue_messages WHERE queue = ?', queue);
  }

  async deadLetterDepth(queue: QueueName): Promise<number> {
    return this.count('SELECT COUNT(*) AS count FROM dead_letter_messages WHERE queue = ?', queue);
  }

  private count(sql: string, queue: QueueName): number {
    const row = this.db.prepare<[string], CountRow>(sql).get(queue);
    return row ? row.count : 0;
  }
}

// A payload that is not JSON is passed through as text; the consumer rejects it
function parsePayload(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
