export * from './JobStatus';
export * from './SummaryParameters';
export * from './RepositoryReference';
