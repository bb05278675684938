#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerTaskCommands } from './commands/tasks';
import { registerSSHCommands } from './commands/ssh';
import { registerUtilityCommands } from './commands/utility';

const program = new Command();

program
  .name('glacio-deploy')
  .description('Push, build, test and restart glacio on its server')
  .option('-H, --host <host>', 'Target host, an ssh config alias or hostname')
  .option('--no-ssh-config', 'Do not resolve the host through ~/.ssh/config');

registerTaskCommands(program);
registerUtilityCommands(program);
registerSSHCommands(program);

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`✗ Error: ${message}`));
  process.exit(1);
});
