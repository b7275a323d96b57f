// Persistence
export * from './persistence/sqlite';

// Queue
export * from './queue';

// GitHub
export * from './github';

// Repository fetching and extraction
export * from './git';
export * from './extraction';

// Summarizers
export * from './ai';

// Command Runner
export * from './runner';

// NestJS
export * from './nestjs';
