export { GitHubApiClient } from './GitHubApiClient';
