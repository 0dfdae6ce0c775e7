import { readdirSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { Project } from './project.js';

/**
 * Lists the immediate subdirectories of a directory.
 * Returns null when the directory itself does not exist.
 */
export type DirectoryLister = (dir: string) => string[] | null;

export const listSubdirectories: DirectoryLister = (dir) => {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
};

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Directories under a listed organization that match no listed project.
 *
 * Every organization any project names is scanned, ignored ones included,
 * and every listed project counts as known. Sorted by path.
 */
export function findOrphans(
  projects: readonly Project[],
  root: string,
  lister: DirectoryLister = listSubdirectories,
): string[] {
  const known = new Set(projects.map((p) => p.path));
  const orgs = [...new Set(projects.map((p) => p.org))];
  const orphans: string[] = [];

  for (const org of orgs) {
    const entries = lister(join(root, org));
    if (!entries) continue;
    for (const name of entries) {
      const path = `${org}/${name}`;
      if (!known.has(path)) orphans.push(path);
    }
  }

  return orphans.sort((a, b) => a.localeCompare(b));
}

/** Recursively remove each orphan directory under root. Returns the paths removed. */
export async function deleteOrphans(
  orphans: readonly string[],
  root: string,
  onDelete?: (path: string) => void,
): Promise<string[]> {
  const removed: string[] = [];
  for (const path of orphans) {
    await rm(join(root, path), { recursive: true, force: true });
    removed.push(path);
    onDelete?.(path);
  }
  return removed;
}
