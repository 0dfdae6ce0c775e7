import { Octokit } from 'octokit';
import { ConfigurationError } from '../core/errors.js';
import type { ExternalListing } from '../listing/entries.js';

/** Which account's repositories a GitHub listing URL points at. */
export interface GitHubListingTarget {
  /** API root for GitHub Enterprise; undefined means api.github.com. */
  baseUrl?: string;
  scope: 'org' | 'user';
  owner: string;
}

/**
 * Parse a GitHub listing URL:
 *   https://github.com/<org>
 *   https://api.github.com/orgs/<org>/repos
 *   https://api.github.com/users/<user>/repos
 *   https://<host>/api/v3/orgs/<org>/repos   (Enterprise)
 */
export function parseGitHubListingUrl(url: string): GitHubListingTarget {
  const parsed = new URL(url);
  const segments = parsed.pathname.split('/').filter((s) => s.length > 0);

  if (parsed.hostname === 'github.com' && segments.length >= 1) {
    return { scope: 'org', owner: segments[0] };
  }

  let baseUrl: string | undefined;
  let rest = segments;
  if (parsed.hostname !== 'api.github.com') {
    const apiIdx = segments.findIndex((s, i) => s === 'api' && segments[i + 1] === 'v3');
    if (apiIdx === -1) {
      throw new ConfigurationError(`Could not parse a GitHub owner from URL: ${url}`);
    }
    baseUrl = `${parsed.protocol}//${parsed.host}/${segments.slice(0, apiIdx + 2).join('/')}`;
    rest = segments.slice(apiIdx + 2);
  }

  const [collection, owner] = rest;
  if ((collection === 'orgs' || collection === 'users') && owner) {
    return { baseUrl, scope: collection === 'orgs' ? 'org' : 'user', owner };
  }
  throw new ConfigurationError(`Could not parse a GitHub owner from URL: ${url}`);
}

/** The fields of a GitHub repository object a listing needs. */
export interface GitHubRepoSummary {
  owner: { login: string };
  name: string;
  html_url: string;
}

export function repoToListing(repo: GitHubRepoSummary): ExternalListing {
  return { kind: 'external', owner: repo.owner.login, name: repo.name, url: repo.html_url };
}

/**
 * GitHub API client for repository listings.
 * Wraps Octokit pagination; works unauthenticated, within the anonymous rate limit.
 */
export class GitHubClient {
  private octokit: Octokit;

  private constructor(octokit: Octokit) {
    this.octokit = octokit;
  }

  static create(options: { token?: string; baseUrl?: string } = {}): GitHubClient {
    return new GitHubClient(new Octokit({
      ...(options.token ? { auth: options.token } : {}),
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
    }));
  }

  async listRepos(target: GitHubListingTarget): Promise<ExternalListing[]> {
    const repos: GitHubRepoSummary[] = target.scope === 'org'
      ? await this.octokit.paginate(this.octokit.rest.repos.listForOrg, { org: target.owner, per_page: 100 })
      : await this.octokit.paginate(this.octokit.rest.repos.listForUser, { username: target.owner, per_page: 100 });
    return repos.map(repoToListing);
  }
}
