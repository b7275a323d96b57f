import { Octokit } from '@octokit/rest';
import { IGitHubApiClient, RepoInfo } from '../../domain/ports/IGitHubApiClient';

/**
 * Client for GitHub API operations
 * Used to size a repository before cloning it
 * Implements IGitHubApiClient port from domain
 */
export class GitHubApiClient implements IGitHubApiClient {
  private octokit: Octokit;

  constructor(token?: string, octokit?: Octokit) {
    this.octokit =
      octokit ||
      new Octokit({
        auth: token || process.env.GITHUB_TOKEN || undefined,
      });
  }

  async getRepoInfo(owner: string, repo: string): Promise<RepoInfo | null> {
    try {
      const { data } = await this.octokit.repos.get({
        owner,
        repo,
      });

      return {
        owner: data.owner.login,
        name: data.name,
        defaultBranch: data.default_branch,
        private: data.private,
        sizeKb: data.size,
      };
    } catch (error: unknown) {
      if (hasStatus(error, 404)) {
        return null;
      }
      throw error;
    }
  }
}

function hasStatus(error: unknown, status: number): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === status;
}
