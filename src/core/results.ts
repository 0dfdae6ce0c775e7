import type { GitFailureKind } from './errors.js';

export interface NotOnMainEntry {
  path: string;
  branch: string;
}

export interface ErroredEntry {
  path: string;
  kind: GitFailureKind;
  message: string;
}

/** What one Project.sync() did. */
export type SyncOutcome =
  | { status: 'cloned' }
  | { status: 'updated' }
  | { status: 'fetched' }
  | { status: 'offMain'; branch: string }
  | { status: 'skipped' }
  | { status: 'error'; kind: GitFailureKind; message: string };

export type SyncStatus = SyncOutcome['status'];

/** Collects what workers report during one run. */
export interface ResultSink {
  recordNotOnMain(path: string, branch: string): void;
  recordError(path: string, kind: GitFailureKind, message: string): void;
}

export interface SyncReport {
  notOnMain: NotOnMainEntry[];
  errored: ErroredEntry[];
  orphans: string[];
  counts: Record<SyncStatus, number>;
}

/**
 * Scheduler-owned aggregator. Workers only reach the lists through these
 * methods, and each call completes within a single event-loop turn.
 * Entries are keyed by path: a path lands in each list at most once per run.
 */
export class SyncResults implements ResultSink {
  private readonly notOnMain = new Map<string, NotOnMainEntry>();
  private readonly errored = new Map<string, ErroredEntry>();
  private readonly counts: Record<SyncStatus, number> = {
    cloned: 0, updated: 0, fetched: 0, offMain: 0, skipped: 0, error: 0,
  };

  recordNotOnMain(path: string, branch: string): void {
    if (!this.notOnMain.has(path)) this.notOnMain.set(path, { path, branch });
  }

  recordError(path: string, kind: GitFailureKind, message: string): void {
    if (!this.errored.has(path)) this.errored.set(path, { path, kind, message });
  }

  recordOutcome(outcome: SyncOutcome): void {
    this.counts[outcome.status]++;
  }

  /** Sorted copy of everything recorded so far. */
  snapshot(orphans: readonly string[] = []): SyncReport {
    const byPath = <T extends { path: string }>(a: T, b: T): number => a.path.localeCompare(b.path);
    return {
      notOnMain: [...this.notOnMain.values()].sort(byPath),
      errored: [...this.errored.values()].sort(byPath),
      orphans: [...orphans].sort((a, b) => a.localeCompare(b)),
      counts: { ...this.counts },
    };
  }
}
