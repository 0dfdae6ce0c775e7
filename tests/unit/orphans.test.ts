import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Project } from '../../src/core/project.js';
import { deleteOrphans, findOrphans, listSubdirectories, type DirectoryLister } from '../../src/core/orphans.js';

function project(path: string): Project {
  const [org, name] = path.split('/');
  return new Project({ org, name, gitUri: `https://git.example.test/${path}`, recurse: false });
}

/** In-memory directory tree: org → subdirectories. */
function memoryLister(root: string, tree: Record<string, string[]>): DirectoryLister {
  return (dir) => {
    for (const [org, entries] of Object.entries(tree)) {
      if (join(root, org) === dir) return entries;
    }
    return null;
  };
}

describe('findOrphans', () => {
  it('returns directories with no matching project', () => {
    const lister = memoryLister('/m', { a: ['x', 'y', 'z'] });
    expect(findOrphans([project('a/x'), project('a/y')], '/m', lister)).toEqual(['a/z']);
  });

  it('skips organizations with no directory', () => {
    const lister = memoryLister('/m', { a: ['x'] });
    expect(findOrphans([project('a/x'), project('b/y')], '/m', lister)).toEqual([]);
  });

  it('only scans organizations the listing names', () => {
    const lister = memoryLister('/m', { a: ['x'], unrelated: ['q'] });
    expect(findOrphans([project('a/x')], '/m', lister)).toEqual([]);
  });

  it('sorts across organizations', () => {
    const lister = memoryLister('/m', { b: ['old', 'keep'], a: ['zeta', 'alpha', 'keep'] });
    const projects = [project('b/keep'), project('a/keep')];
    expect(findOrphans(projects, '/m', lister)).toEqual(['a/alpha', 'a/zeta', 'b/old']);
  });

  it('returns nothing for an empty project set', () => {
    expect(findOrphans([], '/m', memoryLister('/m', { a: ['x'] }))).toEqual([]);
  });
});

describe('orphans on disk', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'orgmirror-orphans-'));
    for (const dir of ['a/x', 'a/y', 'a/z/.git', 'b/w']) mkdirSync(join(root, dir), { recursive: true });
    writeFileSync(join(root, 'a', 'NOTES.txt'), 'not a repo');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists only subdirectories', () => {
    expect(listSubdirectories(join(root, 'a'))?.sort()).toEqual(['x', 'y', 'z']);
  });

  it('returns null for a missing directory', () => {
    expect(listSubdirectories(join(root, 'nope'))).toBeNull();
  });

  it('deletes exactly the orphan set, after which none remain', async () => {
    const projects = [project('a/x'), project('a/y'), project('b/w')];
    const orphans = findOrphans(projects, root);
    expect(orphans).toEqual(['a/z']);

    const deleted: string[] = [];
    const removed = await deleteOrphans(orphans, root, (p) => deleted.push(p));

    expect(removed).toEqual(['a/z']);
    expect(deleted).toEqual(['a/z']);
    expect(existsSync(join(root, 'a', 'z'))).toBe(false);
    expect(existsSync(join(root, 'a', 'x'))).toBe(true);
    expect(existsSync(join(root, 'a', 'y'))).toBe(true);
    expect(existsSync(join(root, 'a', 'NOTES.txt'))).toBe(true);
    expect(existsSync(join(root, 'b', 'w'))).toBe(true);
    expect(findOrphans(projects, root)).toEqual([]);
  });
});
