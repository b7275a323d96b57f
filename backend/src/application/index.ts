// Commands
export * from './commands/SubmitAnalysis';

// Queries
export * from './queries/GetAnalysisStatus';
export * from './queries/GetPipelineHealth';

// Queue messages
export * from './messages/PipelineMessages';

// Stage workers
export * from './services/QueueWorker';
export * from './services/RepoProcessingWorker';
export * from './services/AiAnalysisWorker';
export * from './services/ResultConsumer';
export * from './services/withTimeout';
