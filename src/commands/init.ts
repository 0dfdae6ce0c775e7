import type { Command } from 'commander';
import chalk from 'chalk';
import { ConfigFile } from '../config/config-file.js';
import { APP_NAME } from '../config/branding.js';
import { exitWithError } from './shared.js';

export function registerInit(program: Command): void {
  program
    .command('init')
    .description(`Write a starter ${APP_NAME}.yaml`)
    .option('-d, --dir <path>', 'Directory for the config file', '.')
    .action((opts: { dir: string }) => {
      try {
        const config = ConfigFile.init(opts.dir);
        console.log(chalk.green(`✓ Created ${config.path}`));
        console.log(chalk.dim('  Set source.url to your listing, then run:'));
        console.log(chalk.dim(`    ${APP_NAME} sync`));
      } catch (err) {
        exitWithError(err);
      }
    });
}
