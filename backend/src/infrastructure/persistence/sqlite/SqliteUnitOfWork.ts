import Database from 'better-sqlite3';
import { IUnitOfWork } from '../../../domain/ports/IUnitOfWork';
import { getDatabase } from './database';

/**
 * Runs work inside a write transaction on the shared connection, so the
 * job store and the queue tables commit or roll back together.
 *
 * Units are serialized within the process: a connection holds at most one
 * open transaction.
 */
export class SqliteUnitOfWork implements IUnitOfWork {
  private db: Database.Database;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(db?: Database.Database) {
    this.db = db || getDatabase();
  }

  run<T>(work: () => Promise<T>): Promise<T> {
    const next = this.tail.then(
      () => this.execute(work),
      () => this.execute(work),
    );
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async execute<T>(work: () => Promise<T>): Promise<T> {
    this.db.exec('BEGIN IMMEDIATE');
    try {
      const result = await work();
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
      throw error;
    }
  }
}
