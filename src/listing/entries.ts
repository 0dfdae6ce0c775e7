import { z } from 'zod';
import { Project } from '../core/project.js';
import { ConfigurationError } from '../core/errors.js';

// ─── Listing Entries ───────────────────────────────────────────────

/** An `org/name` entry from a code-review or Gitea listing. */
export interface StandardListing {
  kind: 'standard';
  fullName: string;
}

/** A GitHub-style repository object. */
export interface ExternalListing {
  kind: 'external';
  owner: string;
  name: string;
  url: string;
}

export type ListingEntry = StandardListing | ExternalListing;

export interface ProjectDefaults {
  /** Clone URL prefix for standard entries, e.g. https://opendev.org */
  cloneBase: string;
  recurse: boolean;
}

function isSafeSegment(segment: string): boolean {
  return segment.length > 0 && segment !== '.' && segment !== '..' && !/[/\\]/.test(segment);
}

/** Normalize either kind of entry into a Project. Null when org or name can't be a directory. */
export function projectFromListing(entry: ListingEntry, defaults: ProjectDefaults): Project | null {
  if (entry.kind === 'external') {
    if (!isSafeSegment(entry.owner) || !isSafeSegment(entry.name)) return null;
    return new Project({ org: entry.owner, name: entry.name, gitUri: entry.url, recurse: defaults.recurse });
  }

  const slash = entry.fullName.indexOf('/');
  if (slash === -1) return null;
  const org = entry.fullName.slice(0, slash);
  const name = entry.fullName.slice(slash + 1);
  if (!isSafeSegment(org) || !isSafeSegment(name)) return null;

  const base = defaults.cloneBase.replace(/\/+$/, '');
  return new Project({ org, name, gitUri: `${base}/${org}/${name}`, recurse: defaults.recurse });
}

export function describeEntry(entry: ListingEntry): string {
  return entry.kind === 'standard' ? entry.fullName : `${entry.owner}/${entry.name}`;
}

// ─── Standard Payload Shapes ───────────────────────────────────────

const FullNameItemSchema = z.object({ full_name: z.string() });

/** Plain array of `{ full_name }`. */
const FullNameArraySchema = z.array(FullNameItemSchema);

/** Gitea `/api/v1/repos/search` envelope. */
const GiteaSearchSchema = z.object({
  ok: z.boolean().optional(),
  data: z.array(FullNameItemSchema),
});

/** Gerrit `/projects/` map keyed by project name. */
const GerritProjectMapSchema = z.record(
  z.string(),
  z.object({ state: z.string().optional() }),
);

/** Gerrit prefixes JSON responses with this line against XSSI. */
const XSSI_GUARD = /^\)\]\}'[^\n]*\n?/;

/** Parse a standard listing body into entries, in document order. */
export function parseStandardPayload(body: string): StandardListing[] {
  let json: unknown;
  try {
    json = JSON.parse(body.replace(XSSI_GUARD, ''));
  } catch {
    throw new ConfigurationError('Listing response is not valid JSON');
  }

  const asArray = FullNameArraySchema.safeParse(json);
  if (asArray.success) {
    return asArray.data.map((item): StandardListing => ({ kind: 'standard', fullName: item.full_name }));
  }

  const asSearch = GiteaSearchSchema.safeParse(json);
  if (asSearch.success) {
    return asSearch.data.data.map((item): StandardListing => ({ kind: 'standard', fullName: item.full_name }));
  }

  const asGerrit = GerritProjectMapSchema.safeParse(json);
  if (asGerrit.success) {
    return Object.entries(asGerrit.data)
      .filter(([, project]) => project.state !== 'HIDDEN')
      .map(([fullName]): StandardListing => ({ kind: 'standard', fullName }));
  }

  throw new ConfigurationError(
    'Unrecognized listing format: expected an array of { full_name }, a search result envelope, or a project map',
  );
}
