// External service ports (interfaces)
export * from './IBroker';
export * from './IUnitOfWork';
export * from './IRepositoryFetcher';
export * from './IContentExtractor';
export * from './ISummarizer';
export * from './ISummarizerFactory';
export * from './IGitHubApiClient';
export * from './ICommandRunner';
