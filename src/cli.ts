#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand, InitOptions } from './commands/init.js';
import { serveCommand, ServeOptions } from './commands/serve.js';
import { usersCommand, UsersOptions } from './commands/users.js';
import { pruneCommand, PruneOptions } from './commands/prune.js';
import { configCheckCommand } from './commands/config.js';
import { c } from './utils.js';

const program = new Command();

program
  .name('trainlog')
  .description('Accounts, email verification and Google/GitHub sign-in for trainlog')
  .version('0.1.0');

program
  .command('init')
  .description('Create the auth database and its tables')
  .option('--db <path>', 'Database file (default: DATABASE_PATH or .trainlog/auth.db)')
  .action((opts: InitOptions) => initCommand(opts));

program
  .command('serve')
  .description('Start the HTTP server')
  .option('-p, --port <port>', 'Port to listen on (overrides PORT)')
  .option('--db <path>', 'Database file (overrides DATABASE_PATH)')
  .action((opts: ServeOptions) => serveCommand(opts));

program
  .command('users')
  .description('List accounts with verification status and linked providers')
  .option('--db <path>', 'Database file')
  .option('--json', 'Output as JSON')
  .action((opts: UsersOptions) => usersCommand(opts));

program
  .command('prune')
  .description('Delete expired sessions and spent verification tokens')
  .option('--db <path>', 'Database file')
  .action((opts: PruneOptions) => pruneCommand(opts));

const config = program
  .command('config')
  .description('Inspect configuration');

config
  .command('check')
  .description('Show every environment variable (secrets masked) and validate them')
  .action(() => {
    if (!configCheckCommand()) process.exitCode = 1;
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`${c.red}✗ ${err instanceof Error ? err.message : String(err)}${c.reset}`);
  process.exit(1);
});
