import { RepositoryReference } from '../value-objects/RepositoryReference';

/**
 * Port for bringing a repository onto local disk
 * Infrastructure provides the adapter implementation
 */

export interface FetchedRepository {
  path: string;
  cleanup(): Promise<void>;
}

export interface IRepositoryFetcher {
  /**
   * Fetch the repository into a private working directory.
   * Throws FetchError when the repository is unreachable, too large or slow.
   */
  fetch(reference: RepositoryReference, jobId: string): Promise<FetchedRepository>;
}

export const REPOSITORY_FETCHER = Symbol('IRepositoryFetcher');
