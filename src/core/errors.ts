/** Why a git command failed, as far as its stderr tells. */
export type GitFailureKind = 'diverged' | 'network' | 'timeout' | 'other';

const DIVERGED_PATTERNS = [
  /not possible to fast-forward/i,
  /diverging branches/i,
  /non-fast-forward/i,
];

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /unable to access/i,
  /could not read from remote repository/i,
  /connection (timed out|refused|reset)/i,
  /the remote end hung up/i,
  /early eof/i,
];

/** Classify a failed git command from its stderr. */
export function classifyGitFailure(stderr: string): GitFailureKind {
  if (DIVERGED_PATTERNS.some((p) => p.test(stderr))) return 'diverged';
  if (NETWORK_PATTERNS.some((p) => p.test(stderr))) return 'network';
  return 'other';
}

/**
 * A git subcommand exited non-zero (or was killed by the timeout).
 * Recorded against the repository; never retried.
 */
export class GitOperationFailed extends Error {
  readonly args: readonly string[];
  readonly cwd: string;
  readonly stderr: string;
  readonly kind: GitFailureKind;

  constructor(args: readonly string[], cwd: string, stderr: string, kind?: GitFailureKind) {
    const firstLine = stderr.trim().split('\n')[0] || 'no output';
    super(`git ${args.join(' ')} failed in ${cwd}: ${firstLine}`);
    this.name = 'GitOperationFailed';
    this.args = args;
    this.cwd = cwd;
    this.stderr = stderr;
    this.kind = kind ?? classifyGitFailure(stderr);
  }

  /** First non-empty stderr line, for one-line status output. */
  get summary(): string {
    return this.stderr.trim().split('\n')[0] || this.kind;
  }
}

/** Bad config, missing org directories, or an unusable listing. Fatal before any git work. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A worker hit something other than a git failure; the whole run stops. */
export class WorkerFault extends Error {
  readonly projectPath: string;

  constructor(projectPath: string, cause: unknown) {
    super(`Worker fault while syncing ${projectPath}: ${toErrorMessage(cause)}`, { cause });
    this.name = 'WorkerFault';
    this.projectPath = projectPath;
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
