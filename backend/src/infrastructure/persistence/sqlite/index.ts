export { getDatabase, closeDatabase, createDatabase, createTestDatabase } from './database';
export { SqliteAnalysisJobRepository } from './AnalysisJobRepository';
export { SqliteUnitOfWork } from './SqliteUnitOfWork';
