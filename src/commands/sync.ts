import { Option, type Command } from 'commander';
import chalk from 'chalk';
import { Orchestrator, ExitCode } from '../core/orchestrator.js';
import { exitWithError, parseNonNegativeInt, resolveRunOptions, type CommonOptions } from './shared.js';

interface SyncCommandOptions extends CommonOptions {
  jobs?: number;
  ignore?: string[];
  recurseSubmodules?: boolean;
  createOrgDirs?: boolean;
  deleteOnly?: boolean;
  yes?: boolean;
  gitTimeout?: number;
}

/**
 * First SIGINT/SIGTERM stops dispatch and lets the report print;
 * a second one exits immediately.
 */
export function installInterruptHandler(controller: AbortController): () => void {
  const onSignal = (): void => {
    if (controller.signal.aborted) process.exit(ExitCode.interrupted);
    console.error(chalk.yellow('\n  Interrupted: no new repositories will be started. Press Ctrl-C again to exit now.'));
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

export function registerSync(program: Command): void {
  program
    .command('sync', { isDefault: true })
    .description('Clone missing repositories and pull or fetch existing ones')
    .argument('[url]', 'Repository listing URL (overrides source.url)')
    .option('-c, --config <file>', 'Config file (default: nearest orgmirror.yaml)')
    .option('-r, --root <dir>', 'Mirror root directory')
    .addOption(new Option('--kind <kind>', 'Listing kind').choices(['standard', 'github']))
    .option('-j, --jobs <n>', 'Parallel git workers (0 = one per core)', parseNonNegativeInt)
    .option('-i, --ignore <orgs...>', 'Organizations never cloned into')
    .option('--recurse-submodules', 'Clone with --recurse-submodules')
    .option('--create-org-dirs', 'Allow organization directories that do not exist yet')
    .option('--delete-only', 'Delete orphaned directories, then exit without syncing')
    .option('-y, --yes', 'Do not ask before deleting')
    .option('--git-timeout <ms>', 'Kill a git command silent for this long (0 = never)', parseNonNegativeInt)
    .action(async (url: string | undefined, opts: SyncCommandOptions) => {
      let code: number;
      const controller = new AbortController();
      const removeHandler = installInterruptHandler(controller);
      try {
        const options = resolveRunOptions(opts.config, { ...opts, url });
        code = await new Orchestrator(options).sync(controller.signal);
      } catch (err) {
        exitWithError(err);
      } finally {
        removeHandler();
      }
      // In-flight git processes from an aborted run must not keep us alive.
      process.exit(code);
    });
}
