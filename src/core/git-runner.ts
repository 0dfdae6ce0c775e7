import { spawn } from 'node:child_process';
import { statSync } from 'node:fs';
import { GitOperationFailed } from './errors.js';

export interface GitCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs one git subcommand in a working directory.
 * Resolves only on exit code 0; anything else rejects with GitOperationFailed.
 */
export interface GitRunner {
  run(args: readonly string[], cwd: string): Promise<GitCommandResult>;
}

export interface ProcessGitRunnerOptions {
  /** Kill a git command that produces no output for this long. 0 or undefined disables it. */
  timeoutMs?: number;
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function isMissingProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

/**
 * GitRunner that spawns git in its own process group.
 *
 * Children are detached from the terminal's group, so a Ctrl-C reaches only
 * this process and clones already running are left to finish.
 */
export class ProcessGitRunner implements GitRunner {
  private readonly timeoutMs: number;

  constructor(options: ProcessGitRunnerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  run(args: readonly string[], cwd: string): Promise<GitCommandResult> {
    if (!isDirectory(cwd)) {
      return Promise.reject(new GitOperationFailed(args, cwd, `not a directory: ${cwd}`));
    }

    return new Promise((resolve, reject) => {
      const child = spawn('git', [...args], {
        cwd,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      const killGroup = (): void => {
        timedOut = true;
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, 'SIGKILL');
        } catch (err) {
          if (!isMissingProcess(err)) reject(err);
        }
      };
      const arm = (): void => {
        if (this.timeoutMs <= 0) return;
        clearTimeout(timer);
        timer = setTimeout(killGroup, this.timeoutMs);
      };

      child.stdout.on('data', (chunk: Buffer) => {
        stdout.push(chunk);
        arm();
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
        arm();
      });
      arm();

      // Spawn failures (git missing from PATH) are not repository failures.
      child.on('error', (err) => {
        clearTimeout(timer);
        reject(err);
      });

      child.on('close', (code) => {
        clearTimeout(timer);
        const out = Buffer.concat(stdout).toString('utf-8');
        const err = Buffer.concat(stderr).toString('utf-8');

        if (timedOut) {
          reject(new GitOperationFailed(args, cwd, `timed out after ${this.timeoutMs}ms`, 'timeout'));
        } else if (code === 0) {
          resolve({ stdout: out, stderr: err, exitCode: 0 });
        } else {
          reject(new GitOperationFailed(args, cwd, err || `exited with code ${code ?? 'null'}`));
        }
      });
    });
  }
}
