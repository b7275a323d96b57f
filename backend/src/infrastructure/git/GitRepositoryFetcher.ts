import { Logger } from '@nestjs/common';
import { simpleGit, SimpleGitOptions } from 'simple-git';
import { randomBytes } from 'crypto';
import { lstat, mkdir, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FetchedRepository, IRepositoryFetcher } from '../../domain/ports/IRepositoryFetcher';
import { IGitHubApiClient, RepoInfo } from '../../domain/ports/IGitHubApiClient';
import { RepositoryReference } from '../../domain/value-objects/RepositoryReference';
import { FetchError, describeError } from '../../domain/errors';

export type CloneFunction = (url: string, targetDir: string, options: string[]) => Promise<void>;

export interface GitFetcherOptions {
  cloneDir?: string;
  timeoutMs?: number;
  maxRepositorySizeKb?: number;
  token?: string;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 120000;
export const DEFAULT_MAX_REPOSITORY_SIZE_KB = 512000;

/**
 * Shallow clone through simple-git; git is killed when it blocks for longer
 * than the fetch timeout. Prompts are disabled so a private repository fails
 * instead of waiting for credentials.
 */
export function createSimpleGitClone(timeoutMs: number): CloneFunction {
  return async (url, targetDir, options) => {
    const gitOptions: Partial<SimpleGitOptions> = {
      binary: 'git',
      maxConcurrentProcesses: 1,
      timeout: { block: timeoutMs },
    };
    await simpleGit(gitOptions)
      .env({ ...process.env, GIT_TERMINAL_PROMPT: '0' })
      .clone(url, targetDir, options);
  };
}

/**
 * Brings a repository onto local disk for extraction.
 * Implements IRepositoryFetcher port from domain
 */
export class GitRepositoryFetcher implements IRepositoryFetcher {
  private readonly logger = new Logger(GitRepositoryFetcher.name);
  private readonly cloneDir: string;
  private readonly maxRepositorySizeKb: number;
  private readonly token: string;
  private readonly clone: CloneFunction;

  constructor(
    private readonly apiClient: IGitHubApiClient | null,
    options: GitFetcherOptions = {},
    clone?: CloneFunction,
  ) {
    this.cloneDir = options.cloneDir || join(tmpdir(), 'repo-digest');
    this.maxRepositorySizeKb = options.maxRepositorySizeKb ?? DEFAULT_MAX_REPOSITORY_SIZE_KB;
    this.token = options.token ?? process.env.GITHUB_TOKEN ?? '';
    this.clone = clone || createSimpleGitClone(options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS);
  }

  async fetch(reference: RepositoryReference, jobId: string): Promise<FetchedRepository> {
    await this.checkReportedSize(reference);

    const targetDir = join(this.cloneDir, `job-${jobId}-${randomBytes(4).toString('hex')}`);
    await mkdir(targetDir, { recursive: true });
    const cleanup = async (): Promise<void> => {
      await rm(targetDir, { recursive: true, force: true });
    };

    try {
      await this.clone(this.getAuthenticatedUrl(reference), targetDir, ['--depth', '1', '--single-branch']);
    } catch (error) {
      await cleanup();
      throw new FetchError(this.describeCloneFailure(reference, error));
    }

    const sizeKb = Math.ceil((await directorySize(targetDir)) / 1024);
    if (sizeKb > this.maxRepositorySizeKb) {
      await cleanup();
      throw new FetchError(
        `Repository '${reference.fullName}' is too large (${sizeKb} KB, limit ${this.maxRepositorySizeKb} KB)`,
      );
    }

    this.logger.debug(`Cloned ${reference.fullName} into ${targetDir} (${sizeKb} KB)`);
    return { path: targetDir, cleanup };
  }

  /**
   * GitHub reports the repository size, so oversized repositories are refused
   * without downloading them. Other hosts are only measured after the clone.
   */
  private async checkReportedSize(reference: RepositoryReference): Promise<void> {
    if (!reference.isGitHub || !this.apiClient) {
      return;
    }

    let info: RepoInfo | null;
    try {
      info = await this.apiClient.getRepoInfo(reference.owner, reference.name);
    } catch (error) {
      this.logger.warn(`Could not read repository metadata for ${reference.fullName}: ${describeError(error)}`);
      return;
    }

    if (info === null) {
      throw new FetchError(`Repository '${reference.fullName}' not found or access denied`);
    }
    if (info.sizeKb > this.maxRepositorySizeKb) {
      throw new FetchError(
        `Repository '${reference.fullName}' is too large (${info.sizeKb} KB, limit ${this.maxRepositorySizeKb} KB)`,
      );
    }
  }

  private describeCloneFailure(reference: RepositoryReference, error: unknown): string {
    const detail = this.redact(describeError(error)).trim();
    let message = `Failed to clone repository '${reference.fullName}'.`;

    if (/timed? ?out|block timeout/i.test(detail)) {
      message += ' The clone took too long.';
    } else if (/Authentication failed|could not read Username/i.test(detail)) {
      message += ' Authentication failed.';
      if (!this.token) {
        message += ' This may be a private repository.';
      }
    } else if (/Repository not found|not found/i.test(detail)) {
      message += ' Repository not found or access denied.';
    } else if (detail) {
      message += ` Git error: ${detail.slice(0, 200)}`;
    }
    return message;
  }

  private getAuthenticatedUrl(reference: RepositoryReference): string {
    const url = reference.cloneUrl;
    if (!this.token || !reference.isGitHub || !url.startsWith('https://')) {
      return url;
    }
    // https://github.com/user/repo.git -> https://x-access-token:<token>@github.com/user/repo.git
    return url.replace('https://', `https://x-access-token:${this.token}@`);
  }

  private redact(text: string): string {
    return this.token ? text.split(this.token).join('***') : text;
  }
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name !== '.git') {
        total += await directorySize(fullPath);
      }
    } else {
      total += (await lstat(fullPath)).size;
    }
  }
  return total;
}
