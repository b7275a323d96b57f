/**
 * Port for GitHub API operations
 * Infrastructure provides the adapter implementation
 */

export interface RepoInfo {
  owner: string;
  name: string;
  defaultBranch: string;
  private: boolean;
  /** Size reported by GitHub, in kilobytes */
  sizeKb: number;
}

export interface IGitHubApiClient {
  /**
   * Get repository metadata; resolves null when the repository does not exist
   * or is not visible with the configured token
   */
  getRepoInfo(owner: string, repo: string): Promise<RepoInfo | null>;
}

export const GITHUB_API_CLIENT = Symbol('IGitHubApiClient');
