import { ValidationError } from '../errors';

const SEGMENT_PATTERN = /^[\w.-]+$/;
const SCP_PATTERN = /^git@([\w.-]+):([\w.-]+)\/([\w.-]+?)(?:\.git)?\/?$/;
const GITHUB_HOSTS = ['github.com', 'www.github.com'];

interface ParsedReference {
  value: string;
  host: string;
  owner: string;
  name: string;
  cloneUrl: string;
}

/**
 * Value Object representing the repository locator a client submitted.
 * Accepts http(s) URLs with at least owner/name path segments and scp-style
 * git@host:owner/name locators.
 */
export class RepositoryReference {
  private constructor(private readonly parsed: ParsedReference) {}

  static create(value: string): RepositoryReference {
    const trimmed = (value ?? '').trim();
    if (trimmed === '') {
      throw new ValidationError('Repository reference cannot be empty');
    }

    const scp = trimmed.match(SCP_PATTERN);
    if (scp) {
      return new RepositoryReference({
        value: trimmed,
        host: scp[1].toLowerCase(),
        owner: scp[2],
        name: scp[3],
        cloneUrl: trimmed,
      });
    }

    let url: URL;
    try {
      url = new URL(trimmed);
    } catch {
      throw new ValidationError(`Invalid repository reference: ${trimmed}`);
    }

    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new ValidationError(`Unsupported repository protocol: ${url.protocol}`);
    }
    if (url.username || url.password) {
      throw new ValidationError('Repository reference must not embed credentials');
    }

    const segments = url.pathname.split('/').filter(Boolean);
    if (segments.length < 2) {
      throw new ValidationError(`Repository reference must include owner and name: ${trimmed}`);
    }

    const owner = segments[0];
    const name = segments[1].replace(/\.git$/, '');
    if (!SEGMENT_PATTERN.test(owner) || !SEGMENT_PATTERN.test(name)) {
      throw new ValidationError(`Invalid owner or repository name in: ${trimmed}`);
    }

    return new RepositoryReference({
      value: trimmed,
      host: url.host.toLowerCase(),
      owner,
      name,
      cloneUrl: `${url.protocol}//${url.host}/${owner}/${name}.git`,
    });
  }

  get value(): string {
    return this.parsed.value;
  }

  get host(): string {
    return this.parsed.host;
  }

  get owner(): string {
    return this.parsed.owner;
  }

  get name(): string {
    return this.parsed.name;
  }

  get fullName(): string {
    return `${this.parsed.owner}/${this.parsed.name}`;
  }

  get isGitHub(): boolean {
    return GITHUB_HOSTS.includes(this.parsed.host);
  }

  get cloneUrl(): string {
    return this.parsed.cloneUrl;
  }

  equals(other: RepositoryReference): boolean {
    return this.parsed.value === other.parsed.value;
  }

  toString(): string {
    return this.parsed.value;
  }
}
