import type { SourceKind } from '../config/schema.js';
import { ConfigurationError } from '../core/errors.js';
import type { Project } from '../core/project.js';
import { GitHubClient, parseGitHubListingUrl } from '../github/client.js';
import {
  describeEntry,
  parseStandardPayload,
  projectFromListing,
  type ListingEntry,
  type StandardListing,
} from './entries.js';

export type ResolvedSourceKind = Exclude<SourceKind, 'auto'>;

const GITHUB_HOSTS = new Set(['github.com', 'api.github.com']);
const STANDARD_PATHS = [/\/api\/v1\/repos\/search\/?$/, /\/projects\/?$/];

function parseUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid listing URL: ${url}`);
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new ConfigurationError(`Unsupported listing URL scheme: ${parsed.protocol}`);
  }
  return parsed;
}

/** Decide which kind of listing a URL serves. Unknown endpoints are a configuration error. */
export function detectSourceKind(url: string, configured: SourceKind = 'auto'): ResolvedSourceKind {
  const parsed = parseUrl(url);
  if (configured !== 'auto') return configured;

  if (GITHUB_HOSTS.has(parsed.hostname) || parsed.pathname.includes('/api/v3/')) return 'github';
  if (STANDARD_PATHS.some((p) => p.test(parsed.pathname))) return 'standard';

  throw new ConfigurationError(
    `Unsupported listing source: ${url}\n` +
    'Expected a GitHub URL, a Gitea /api/v1/repos/search URL, or a Gerrit /projects/ URL (or set source.kind).',
  );
}

/** https://review.opendev.org/projects/ → https://opendev.org */
export function deriveCloneBase(url: string): string {
  const parsed = parseUrl(url);
  return `${parsed.protocol}//${parsed.host.replace(/^review\./, '')}`;
}

async function fetchListingPage(url: string): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, { headers: { Accept: 'application/json' } });
  } catch (err) {
    throw new ConfigurationError(`Failed to fetch listing from ${url}: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    throw new ConfigurationError(`Failed to fetch listing (${response.status}): ${body || response.statusText}`);
  }
  return response;
}

/** `<https://host/...&page=2>; rel="next"` → absolute URL of the next page. */
export function parseNextLink(header: string | null, base: string): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part);
    if (match) return new URL(match[1], base).toString();
  }
  return undefined;
}

/**
 * Where the next page is, if any. Gitea caps page size regardless of `limit`,
 * so follow `Link: rel="next"`, or count against `x-total-count` and bump `page`.
 */
function nextPageUrl(response: Response, current: string, pageSize: number, seen: number): string | undefined {
  const linked = parseNextLink(response.headers.get('link'), current);
  if (linked) return linked;

  const total = Number(response.headers.get('x-total-count'));
  if (pageSize === 0 || !Number.isInteger(total) || seen >= total) return undefined;

  const next = new URL(current);
  next.searchParams.set('page', String(Number(next.searchParams.get('page') ?? '1') + 1));
  return next.toString();
}

/** Fetch every page of a standard listing. Gerrit answers in one page. */
export async function fetchStandardListing(url: string): Promise<StandardListing[]> {
  const entries: StandardListing[] = [];
  const visited = new Set<string>();
  let next: string | undefined = url;

  while (next !== undefined && !visited.has(next)) {
    visited.add(next);
    const response = await fetchListingPage(next);
    const page = parseStandardPayload(await response.text());
    entries.push(...page);
    next = nextPageUrl(response, next, page.length, entries.length);
  }
  return entries;
}

export interface LoadProjectsOptions {
  url: string;
  kind?: SourceKind;
  cloneBase?: string;
  token?: string;
  recurse: boolean;
  /** Overrides the GitHub client built from url and token. */
  github?: Pick<GitHubClient, 'listRepos'>;
}

export interface LoadedProjects {
  kind: ResolvedSourceKind;
  /** Unique by path, sorted by path. */
  projects: Project[];
  /** Entries whose org or name can't be used as a directory. */
  rejected: string[];
}

/** Fetch a listing and normalize it into projects. */
export async function loadProjects(options: LoadProjectsOptions): Promise<LoadedProjects> {
  const kind = detectSourceKind(options.url, options.kind);

  let entries: ListingEntry[];
  if (kind === 'github') {
    const target = parseGitHubListingUrl(options.url);
    const github = options.github ?? GitHubClient.create({ token: options.token, baseUrl: target.baseUrl });
    entries = await github.listRepos(target);
  } else {
    entries = await fetchStandardListing(options.url);
  }

  const defaults = {
    cloneBase: options.cloneBase ?? deriveCloneBase(options.url),
    recurse: options.recurse,
  };

  const byPath = new Map<string, Project>();
  const rejected: string[] = [];
  for (const entry of entries) {
    const project = projectFromListing(entry, defaults);
    if (!project) {
      rejected.push(describeEntry(entry));
      continue;
    }
    if (!byPath.has(project.path)) byPath.set(project.path, project);
  }

  const projects = [...byPath.values()].sort((a, b) => a.path.localeCompare(b.path));
  return { kind, projects, rejected };
}
