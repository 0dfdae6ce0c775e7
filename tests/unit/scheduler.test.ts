import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { Project } from '../../src/core/project.js';
import { SyncScheduler, type SchedulerOptions } from '../../src/core/scheduler.js';
import { WorkerFault } from '../../src/core/errors.js';
import type { GitRunner } from '../../src/core/git-runner.js';
import { FakeGitRunner, type FakeRepoState } from '../helpers/fake-git.js';

const ROOT = '/mirror';

function project(path: string): Project {
  const [org, name] = path.split('/');
  return new Project({ org, name, gitUri: `https://git.example.test/${path}`, recurse: false });
}

const existsFor = (paths: string[]) => {
  const onDisk = new Set(paths.map((p) => join(ROOT, ...p.split('/'))));
  return (p: string): boolean => onDisk.has(p);
};

function scheduler(git: FakeGitRunner, overrides: Partial<SchedulerOptions> = {}): SyncScheduler {
  return new SyncScheduler({ root: ROOT, git, ignoredOrgs: new Set(), ...overrides });
}

const MIXED_REPOS: Record<string, FakeRepoState> = {
  'acme/api': {},
  'acme/web': { dirty: true },
  'acme/docs': { branch: 'draft' },
  'acme/infra': { failOn: { pull: 'fatal: Not possible to fast-forward, aborting.' } },
  'labs/new': {},
  'labs/broken': { failOn: { clone: 'fatal: repository not found' } },
  'vendor/lib': {},
};
const MIXED_ON_DISK = ['acme/api', 'acme/web', 'acme/docs', 'acme/infra'];

describe('SyncScheduler', () => {
  it('drains every project and aggregates outcomes', async () => {
    const git = new FakeGitRunner(ROOT, MIXED_REPOS);
    const s = scheduler(git, {
      concurrency: 3,
      ignoredOrgs: new Set(['vendor']),
      exists: existsFor(MIXED_ON_DISK),
    });

    const run = await s.run(Object.keys(MIXED_REPOS).map(project));

    expect(run.state).toBe('drained');
    expect(s.state).toBe('drained');
    expect(run.fault).toBeUndefined();
    expect(run.pending).toBe(0);

    const report = run.results.snapshot();
    expect(report.notOnMain).toEqual([{ path: 'acme/docs', branch: 'draft' }]);
    expect(report.errored.map((e) => [e.path, e.kind])).toEqual([
      ['acme/infra', 'diverged'],
      ['labs/broken', 'other'],
    ]);
    expect(report.counts).toEqual({ cloned: 1, updated: 1, fetched: 1, offMain: 1, skipped: 1, error: 2 });
  });

  it('never runs more workers than configured', async () => {
    const paths = Array.from({ length: 12 }, (_, i) => `acme/repo-${i}`);
    const git = new FakeGitRunner(ROOT, {}, 5);

    const run = await scheduler(git, { concurrency: 3 }).run(paths.map(project));

    expect(run.state).toBe('drained');
    expect(git.maxInFlight).toBe(3);
    expect(git.calls).toHaveLength(12);
  });

  it('gives the same result sets with one worker and with eight', async () => {
    const projects = Object.keys(MIXED_REPOS).map(project);
    const options = { ignoredOrgs: new Set(['vendor']), exists: existsFor(MIXED_ON_DISK) };

    const serial = await scheduler(new FakeGitRunner(ROOT, MIXED_REPOS, 1), { ...options, concurrency: 1 }).run(projects);
    const parallel = await scheduler(new FakeGitRunner(ROOT, MIXED_REPOS, 1), { ...options, concurrency: 8 }).run(projects);

    expect(parallel.results.snapshot()).toEqual(serial.results.snapshot());
  });

  it('syncs a project listed twice only once', async () => {
    const git = new FakeGitRunner(ROOT);
    await scheduler(git, { concurrency: 2 }).run([project('acme/api'), project('acme/api')]);
    expect(git.callsFor('acme/api')).toEqual(['clone https://git.example.test/acme/api acme/api']);
  });

  it('drains an empty queue immediately', async () => {
    const run = await scheduler(new FakeGitRunner(ROOT)).run([]);
    expect(run.state).toBe('drained');
  });

  it('aborts the whole run on a non-git exception', async () => {
    const git = new FakeGitRunner(ROOT, { 'acme/bad': { throwOn: 'clone' } });
    const s = scheduler(git, { concurrency: 1 });

    const run = await s.run([project('acme/bad'), project('acme/next'), project('acme/last')]);

    expect(run.state).toBe('aborted');
    expect(run.fault).toBeInstanceOf(WorkerFault);
    expect(run.fault?.projectPath).toBe('acme/bad');
    expect(run.fault?.cause).toBeInstanceOf(TypeError);
    expect(run.pending).toBe(2);
    expect(git.callsFor('acme/next')).toEqual([]);
  });

  it('stops dispatching when the caller aborts', async () => {
    const controller = new AbortController();
    const git = new FakeGitRunner(ROOT, {}, 1);
    const s = scheduler(git, {
      concurrency: 1,
      onOutcome: () => controller.abort(),
    });

    const run = await s.run([project('acme/a'), project('acme/b'), project('acme/c')], controller.signal);

    expect(run.state).toBe('interrupted');
    expect(run.pending).toBe(2);
    expect(run.results.snapshot().counts.cloned).toBe(1);
    expect(git.calls.map((c) => c.path)).toEqual(['acme/a']);
  });

  it('dispatches nothing when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const git = new FakeGitRunner(ROOT);

    const run = await scheduler(git).run([project('acme/a')], controller.signal);

    expect(run.state).toBe('interrupted');
    expect(run.pending).toBe(1);
    expect(git.calls).toEqual([]);
  });

  it('returns without waiting for tasks still in flight', async () => {
    const controller = new AbortController();
    const slow = new FakeGitRunner(ROOT, {}, 50);
    const git: GitRunner = {
      run: (args, cwd) => {
        setTimeout(() => controller.abort(), 5);
        return slow.run(args, cwd);
      },
    };
    const s = new SyncScheduler({ root: ROOT, git, ignoredOrgs: new Set(), concurrency: 2 });

    const run = await s.run([project('acme/a'), project('acme/b'), project('acme/c')], controller.signal);

    expect(run.state).toBe('interrupted');
    expect(run.results.snapshot().counts.cloned).toBe(0);
    expect(run.pending).toBe(1);
  });

  it('aborts the run when the outcome callback throws', async () => {
    const git = new FakeGitRunner(ROOT);
    const s = scheduler(git, {
      concurrency: 1,
      onOutcome: () => {
        throw new TypeError('render bug');
      },
    });

    const run = await s.run([project('acme/a'), project('acme/b')]);

    expect(run.state).toBe('aborted');
    expect(run.fault?.projectPath).toBe('acme/a');
    expect(run.fault?.cause).toBeInstanceOf(TypeError);
    expect(run.pending).toBe(1);
    expect(git.callsFor('acme/b')).toEqual([]);
  });

  it('can only run once', async () => {
    const s = scheduler(new FakeGitRunner(ROOT));
    await s.run([]);
    await expect(s.run([])).rejects.toThrow('can only be called once');
  });
});
