#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, APP_VERSION } from './config/branding.js';
import { registerSync } from './commands/sync.js';
import { registerOrphans } from './commands/orphans.js';
import { registerInit } from './commands/init.js';

const program = new Command();

program
  .name(APP_NAME)
  .description('Keep a local mirror of many organizations\' git repositories in sync')
  .version(APP_VERSION);

registerSync(program);
registerOrphans(program);
registerInit(program);

await program.parseAsync();
