import { availableParallelism } from 'node:os';
import { WorkerFault } from './errors.js';
import type { GitRunner } from './git-runner.js';
import type { Project } from './project.js';
import { SyncResults, type SyncOutcome } from './results.js';

export type SchedulerState = 'idle' | 'filling' | 'draining' | 'drained' | 'aborted' | 'interrupted';

export interface SchedulerOptions {
  root: string;
  git: GitRunner;
  ignoredOrgs: ReadonlySet<string>;
  /** Worker count; defaults to the number of available cores. */
  concurrency?: number;
  exists?: (path: string) => boolean;
  onOutcome?: (project: Project, outcome: SyncOutcome) => void;
}

export interface SchedulerRun {
  state: 'drained' | 'aborted' | 'interrupted';
  results: SyncResults;
  /** Set when a worker hit a non-git exception. */
  fault?: WorkerFault;
  /** Projects never handed to a worker. */
  pending: number;
}

/**
 * Bounded pool of async workers draining a FIFO queue of projects.
 *
 * A git failure stays with its repository. Anything else thrown from a sync
 * or from onOutcome aborts the whole run: no worker takes another project, and run() resolves
 * without waiting for the tasks still in flight. The caller's signal does the
 * same from outside.
 */
export class SyncScheduler {
  private readonly options: SchedulerOptions;
  private readonly queue: Project[] = [];
  private readonly results = new SyncResults();
  private currentState: SchedulerState = 'idle';
  private fault: WorkerFault | undefined;

  constructor(options: SchedulerOptions) {
    this.options = options;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get concurrency(): number {
    const requested = this.options.concurrency ?? 0;
    return requested > 0 ? requested : availableParallelism();
  }

  async run(projects: readonly Project[], signal?: AbortSignal): Promise<SchedulerRun> {
    if (this.currentState !== 'idle') {
      throw new Error('SyncScheduler.run() can only be called once');
    }

    this.currentState = 'filling';
    const seen = new Set<string>();
    for (const project of projects) {
      if (seen.has(project.path)) continue;
      seen.add(project.path);
      this.queue.push(project);
    }

    const abort = new AbortController();
    const onExternalAbort = (): void => abort.abort(signal?.reason);
    if (signal?.aborted) abort.abort(signal.reason);
    else signal?.addEventListener('abort', onExternalAbort, { once: true });

    this.currentState = 'draining';
    const workerCount = Math.min(this.concurrency, this.queue.length);
    const workers = Array.from({ length: workerCount }, () => this.worker(abort));

    const stopped = new Promise<void>((resolve) => {
      if (abort.signal.aborted) resolve();
      else abort.signal.addEventListener('abort', () => resolve(), { once: true });
    });

    try {
      await Promise.race([Promise.all(workers), stopped]);
    } finally {
      signal?.removeEventListener('abort', onExternalAbort);
    }

    if (this.fault) this.currentState = 'aborted';
    else if (abort.signal.aborted) this.currentState = 'interrupted';
    else this.currentState = 'drained';

    return {
      state: this.currentState,
      results: this.results,
      fault: this.fault,
      pending: this.queue.length,
    };
  }

  private async worker(abort: AbortController): Promise<void> {
    const { root, git, ignoredOrgs, exists } = this.options;

    while (!abort.signal.aborted) {
      const project = this.queue.shift();
      if (!project) return;

      try {
        const outcome = await project.sync({ root, git, ignoredOrgs, exists, results: this.results });
        this.results.recordOutcome(outcome);
        this.options.onOutcome?.(project, outcome);
      } catch (err) {
        this.fault ??= new WorkerFault(project.path, err);
        abort.abort(this.fault);
        return;
      }
    }
  }
}
