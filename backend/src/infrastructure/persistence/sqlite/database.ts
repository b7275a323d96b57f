import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, join } from 'path';

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!db) {
    db = createDatabase(process.env.DATABASE_PATH || join(process.cwd(), 'data', 'repo-digest.db'));
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS analysis_jobs (
      id TEXT PRIMARY KEY,
      repository_reference TEXT NOT NULL,
      parameters TEXT NOT NULL,
      owner_identity TEXT,
      status TEXT NOT NULL DEFAULT 'queued',
      summary_content TEXT,
      error_message TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS queue_messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      queue TEXT NOT NULL,
      payload TEXT NOT NULL,
      attempts INTEGER NOT NULL DEFAULT 0,
      visible_at INTEGER NOT NULL,
      receipt TEXT,
      enqueued_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS dead_letter_messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      message_id INTEGER NOT NULL,
      queue TEXT NOT NULL,
      payload TEXT NOT NULL,
      attempts INTEGER NOT NULL,
      reason TEXT NOT NULL,
      enqueued_at INTEGER NOT NULL,
      dead_lettered_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_analysis_jobs_owner ON analysis_jobs(owner_identity, created_at);
    CREATE INDEX IF NOT EXISTS idx_analysis_jobs_status ON analysis_jobs(status);
    CREATE INDEX IF NOT EXISTS idx_queue_messages_visible ON queue_messages(queue, visible_at);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_queue_messages_receipt ON queue_messages(receipt);
    CREATE INDEX IF NOT EXISTS idx_dead_letter_queue ON dead_letter_messages(queue);
  `);
}

/**
 * Create a new database connection at the specified path
 */
export function createDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');
  // Workers in other processes share the file; wait for their write locks
  database.pragma('busy_timeout = 5000');
  initializeSchema(database);
  return database;
}

// For testing purposes
export function createTestDatabase(): Database.Database {
  const testDb = new Database(':memory:');
  testDb.pragma('journal_mode = WAL');
  initializeSchema(testDb);
  return testDb;
}
