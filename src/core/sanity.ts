import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError } from './errors.js';
import type { Project } from './project.js';

/** Non-ignored organizations whose directory is missing under root, sorted. */
export function findMissingOrgDirs(
  projects: readonly Project[],
  root: string,
  ignoredOrgs: ReadonlySet<string>,
  exists: (path: string) => boolean = existsSync,
): string[] {
  const orgs = new Set(projects.map((p) => p.org).filter((org) => !ignoredOrgs.has(org)));
  return [...orgs].filter((org) => !exists(join(root, org))).sort((a, b) => a.localeCompare(b));
}

/**
 * Refuse to run when an organization directory is missing, so a wrong root
 * doesn't turn into hundreds of fresh clones. Skipped with allowCreate.
 */
export function assertOrgDirsExist(
  projects: readonly Project[],
  root: string,
  ignoredOrgs: ReadonlySet<string>,
  options: { allowCreate?: boolean; exists?: (path: string) => boolean } = {},
): void {
  if (options.allowCreate) return;
  const missing = findMissingOrgDirs(projects, root, ignoredOrgs, options.exists);
  if (missing.length === 0) return;

  throw new ConfigurationError(
    [
      `${missing.length} organization director${missing.length === 1 ? 'y is' : 'ies are'} missing under ${root}:`,
      ...missing.map((org) => `  - ${org}`),
      'Run from the mirror root, or pass --create-org-dirs to create them.',
    ].join('\n'),
  );
}
