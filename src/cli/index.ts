#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerMigrateCommands } from './commands/migrate';
import { registerSSHCommands } from './commands/ssh';
import chalk from 'chalk';

const program = new Command();

program
  .name('wpmig')
  .description('Migrate a WordPress site between two servers over SSH');

registerMigrateCommands(program);
registerSSHCommands(program);

program.on('error', (error) => {
  console.error(
    chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`)
  );
  process.exit(1);
});

program.parseAsync().catch((error) => {
  console.error(
    chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`)
  );
  process.exit(1);
});
