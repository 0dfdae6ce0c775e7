import { Option, type Command } from 'commander';
import { Orchestrator } from '../core/orchestrator.js';
import { exitWithError, resolveRunOptions, type CommonOptions } from './shared.js';

export function registerOrphans(program: Command): void {
  program
    .command('orphans')
    .description('List local directories that match no repository in the listing')
    .argument('[url]', 'Repository listing URL (overrides source.url)')
    .option('-c, --config <file>', 'Config file (default: nearest orgmirror.yaml)')
    .option('-r, --root <dir>', 'Mirror root directory')
    .addOption(new Option('--kind <kind>', 'Listing kind').choices(['standard', 'github']))
    .option('--delete', 'Delete the orphaned directories')
    .option('-y, --yes', 'Do not ask before deleting')
    .action(async (url: string | undefined, opts: CommonOptions & { delete?: boolean; yes?: boolean }) => {
      let code: number;
      try {
        const options = resolveRunOptions(opts.config, { url, root: opts.root, kind: opts.kind, yes: opts.yes });
        code = await new Orchestrator(options).orphans(opts.delete ?? false);
      } catch (err) {
        exitWithError(err);
      }
      process.exit(code);
    });
}
