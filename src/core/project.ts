import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { MAIN_BRANCHES } from '../config/branding.js';
import { GitOperationFailed } from './errors.js';
import type { GitRunner } from './git-runner.js';
import type { ResultSink, SyncOutcome } from './results.js';

export interface ProjectInit {
  org: string;
  name: string;
  gitUri: string;
  recurse: boolean;
}

/** Everything Project.sync() needs from the run it belongs to. */
export interface SyncContext {
  /** Mirror root; working directories live at <root>/<org>/<name>. */
  root: string;
  git: GitRunner;
  ignoredOrgs: ReadonlySet<string>;
  results: ResultSink;
  exists?: (path: string) => boolean;
}

/**
 * One remote repository and the policy that keeps its local clone current.
 * Identity is `org/name`.
 */
export class Project {
  readonly org: string;
  readonly name: string;
  readonly gitUri: string;
  readonly recurse: boolean;

  constructor(init: ProjectInit) {
    this.org = init.org;
    this.name = init.name;
    this.gitUri = init.gitUri;
    this.recurse = init.recurse;
    Object.freeze(this);
  }

  /** Relative working directory, also the project's identity. */
  get path(): string {
    return `${this.org}/${this.name}`;
  }

  equals(other: Project): boolean {
    return this.org === other.org && this.name === other.name;
  }

  /**
   * Clone, pull or fetch this repository.
   *
   * Existing clones are only ever pulled with --ff-only or fetched. Git
   * failures are recorded on the sink and returned as an `error` outcome;
   * any other exception propagates to the caller.
   */
  async sync(ctx: SyncContext): Promise<SyncOutcome> {
    const workingDir = join(ctx.root, this.org, this.name);
    const exists = ctx.exists ?? existsSync;

    try {
      if (exists(workingDir)) {
        return await this.update(workingDir, ctx);
      }
      if (ctx.ignoredOrgs.has(this.org)) {
        return { status: 'skipped' };
      }
      await ctx.git.run(this.cloneArgs(), ctx.root);
      return { status: 'cloned' };
    } catch (err) {
      if (!(err instanceof GitOperationFailed)) throw err;
      ctx.results.recordError(this.path, err.kind, err.summary);
      return { status: 'error', kind: err.kind, message: err.summary };
    }
  }

  cloneArgs(): string[] {
    return [
      'clone',
      ...(this.recurse ? ['--recurse-submodules'] : []),
      this.gitUri,
      this.path,
    ];
  }

  private async update(workingDir: string, ctx: SyncContext): Promise<SyncOutcome> {
    const head = await ctx.git.run(['rev-parse', '--abbrev-ref', 'HEAD'], workingDir);
    const branch = head.stdout.trim();

    if (!MAIN_BRANCHES.includes(branch)) {
      ctx.results.recordNotOnMain(this.path, branch);
      await ctx.git.run(['fetch', 'origin'], workingDir);
      return { status: 'offMain', branch };
    }

    // Untracked files don't block a fast-forward.
    const status = await ctx.git.run(['status', '--porcelain', '--untracked-files=no'], workingDir);
    if (status.stdout.trim() !== '') {
      await ctx.git.run(['fetch', 'origin'], workingDir);
      return { status: 'fetched' };
    }

    await ctx.git.run(['pull', '--ff-only'], workingDir);
    return { status: 'updated' };
  }
}
