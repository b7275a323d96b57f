import { Octokit } from '@octokit/rest';
import { GitHubApiClient } from './GitHubApiClient';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('GitHubApiClient', () => {
  let fakeFetch: jest.Mock<Promise<Response>, [string, RequestInit?]>;
  let client: GitHubApiClient;

  beforeEach(() => {
    fakeFetch = jest.fn<Promise<Response>, [string, RequestInit?]>();
    client = new GitHubApiClient(undefined, new Octokit({ request: { fetch: fakeFetch } }));
  });

  it('should map repository metadata', async () => {
    fakeFetch.mockResolvedValueOnce(
      jsonResponse({
        name: 'repo',
        owner: { login: 'user' },
        default_branch: 'main',
        private: false,
        size: 2048,
      }),
    );

    const info = await client.getRepoInfo('user', 'repo');

    expect(fakeFetch.mock.calls[0][0]).toBe('https://api.github.com/repos/user/repo');
    expect(info).toEqual({ owner: 'user', name: 'repo', defaultBranch: 'main', private: false, sizeKb: 2048 });
  });

  it('should return null for a missing or hidden repository', async () => {
    fakeFetch.mockResolvedValueOnce(jsonResponse({ message: 'Not Found' }, 404));

    await expect(client.getRepoInfo('user', 'missing')).resolves.toBeNull();
  });

  it('should rethrow other API errors', async () => {
    fakeFetch.mockResolvedValueOnce(jsonResponse({ message: 'Server Error' }, 500));

    await expect(client.getRepoInfo('user', 'repo')).rejects.toMatchObject({ status: 500 });
  });
});
