export {
  GitRepositoryFetcher,
  GitFetcherOptions,
  CloneFunction,
  createSimpleGitClone,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_REPOSITORY_SIZE_KB,
} from './GitRepositoryFetcher';
