import { mkdirSync } from 'node:fs';
import chalk from 'chalk';
import ora from 'ora';
import { confirm } from '@inquirer/prompts';
import type { RunOptions } from '../config/schema.js';
import { loadProjects, type LoadedProjects, type LoadProjectsOptions } from '../listing/source.js';
import { Report } from '../ui/report.js';
import { ProcessGitRunner, type GitRunner } from './git-runner.js';
import { deleteOrphans, findOrphans, listSubdirectories, type DirectoryLister } from './orphans.js';
import type { Project } from './project.js';
import { assertOrgDirsExist } from './sanity.js';
import { SyncScheduler } from './scheduler.js';

/** Exit codes the CLI hands to process.exit(). */
export const ExitCode = {
  ok: 0,
  failure: 1,
  interrupted: 130,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export interface OrchestratorDeps {
  git?: GitRunner;
  lister?: DirectoryLister;
  exists?: (path: string) => boolean;
  load?: (options: LoadProjectsOptions) => Promise<LoadedProjects>;
  /** Asked before orphans are deleted; defaults to an interactive prompt on a TTY. */
  confirmDelete?: (orphans: readonly string[]) => Promise<boolean>;
}

/**
 * Coordinates one run: listing → sanity check → orphan scan → either orphan
 * deletion or the concurrent sync → report. The report is printed on every
 * path that gets as far as the sync, including abort and interrupt.
 */
export class Orchestrator {
  private readonly options: RunOptions;
  private readonly git: GitRunner;
  private readonly lister: DirectoryLister;
  private readonly deps: OrchestratorDeps;

  constructor(options: RunOptions, deps: OrchestratorDeps = {}) {
    this.options = options;
    this.deps = deps;
    this.git = deps.git ?? new ProcessGitRunner({ timeoutMs: options.gitTimeoutMs });
    this.lister = deps.lister ?? listSubdirectories;
  }

  // ─── Listing ──────────────────────────────────────────────────────

  async loadProjects(): Promise<Project[]> {
    const load = this.deps.load ?? loadProjects;
    const spinner = ora(`Fetching repository listing from ${this.options.sourceUrl}...`).start();
    let loaded: LoadedProjects;
    try {
      loaded = await load({
        url: this.options.sourceUrl,
        kind: this.options.sourceKind,
        cloneBase: this.options.cloneBase,
        token: this.options.token,
        recurse: this.options.recurseSubmodules,
      });
    } catch (err) {
      spinner.fail('Could not load the repository listing');
      throw err;
    }
    spinner.succeed(`Found ${loaded.projects.length} repositories (${loaded.kind} listing)`);

    for (const name of loaded.rejected) {
      console.log(chalk.yellow(`  Skipping listing entry with an unusable name: ${name}`));
    }
    return loaded.projects;
  }

  // ─── Orphans ──────────────────────────────────────────────────────

  findOrphans(projects: readonly Project[]): string[] {
    return findOrphans(projects, this.options.root, this.lister);
  }

  /** Delete orphans after confirmation. Returns the paths actually removed. */
  async deleteOrphans(orphans: readonly string[]): Promise<string[]> {
    if (orphans.length === 0) {
      console.log(chalk.green('  ✓ No orphaned directories'));
      return [];
    }

    console.log(chalk.bold(`\n  ${orphans.length} orphaned director${orphans.length === 1 ? 'y' : 'ies'}:`));
    for (const path of orphans) console.log(`    ${path}`);

    const confirmDelete = this.deps.confirmDelete ?? ((list) => this.promptDelete(list));
    if (!(await confirmDelete(orphans))) {
      console.log(chalk.yellow('\n  Nothing deleted.'));
      return [];
    }

    const spinner = ora('Deleting orphaned directories...').start();
    const removed = await deleteOrphans(orphans, this.options.root, (path) => {
      spinner.text = `Deleted ${path}`;
    });
    spinner.succeed(`Deleted ${removed.length} orphaned director${removed.length === 1 ? 'y' : 'ies'}`);
    return removed;
  }

  private async promptDelete(orphans: readonly string[]): Promise<boolean> {
    if (this.options.assumeYes || !process.stdin.isTTY) return true;
    return confirm({
      message: `Delete ${orphans.length} director${orphans.length === 1 ? 'y' : 'ies'} under ${this.options.root}?`,
      default: false,
    });
  }

  // ─── Full Run ─────────────────────────────────────────────────────

  /**
   * Sync every project. In delete-only mode, delete orphans instead and stop.
   * ConfigurationError propagates before any git work starts.
   */
  async sync(signal?: AbortSignal): Promise<ExitCodeValue> {
    const projects = await this.loadProjects();
    const { root, ignoredOrgs } = this.options;

    assertOrgDirsExist(projects, root, ignoredOrgs, {
      allowCreate: this.options.createOrgDirs,
      exists: this.deps.exists,
    });

    const orphans = this.findOrphans(projects);

    if (this.options.deleteOnly) {
      await this.deleteOrphans(orphans);
      return ExitCode.ok;
    }

    // Clones run with the root as their working directory.
    if (this.options.createOrgDirs) mkdirSync(root, { recursive: true });

    const scheduler = new SyncScheduler({
      root,
      git: this.git,
      ignoredOrgs,
      concurrency: this.options.concurrency,
      exists: this.deps.exists,
      onOutcome: (project, outcome) => Report.renderOutcome(project.path, outcome),
    });

    console.log(chalk.bold(`\n  Syncing ${projects.length} repositories with ${Math.min(scheduler.concurrency, projects.length)} worker(s)\n`));
    const run = await scheduler.run(projects, signal);

    Report.render(run.results.snapshot(orphans));

    if (run.state === 'aborted') {
      console.error(chalk.red(`  ✗ ${run.fault?.message ?? 'Run aborted'}`));
      if (run.pending > 0) console.error(chalk.red(`    ${run.pending} repositories were not processed.`));
      return ExitCode.failure;
    }
    if (run.state === 'interrupted') {
      console.error(chalk.yellow(`  Interrupted; ${run.pending} repositories were not processed.`));
      return ExitCode.interrupted;
    }
    return ExitCode.ok;
  }

  /** List orphans, deleting them when asked. */
  async orphans(remove: boolean): Promise<ExitCodeValue> {
    const projects = await this.loadProjects();
    const orphans = this.findOrphans(projects);

    if (remove) {
      await this.deleteOrphans(orphans);
      return ExitCode.ok;
    }

    if (orphans.length === 0) {
      console.log(chalk.green('  ✓ No orphaned directories'));
    } else {
      console.log(chalk.bold.yellow('\nOrphaned directories:'));
      for (const path of orphans) console.log(`- ${path}`);
    }
    return ExitCode.ok;
  }
}
