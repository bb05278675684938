import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { TASKS } from '../../classes/task-runner';
import { loadConfig } from '../../lib/config';
import { ValidationError } from '../../lib/sanitization';
import { readOverrides } from '../options';

export function registerUtilityCommands(program: Command) {
  // example: npx tsx src/cli/index.ts list
  program
    .command('list')
    .description('List available tasks and the deploy target')
    .action(() => {
      try {
        const config = loadConfig(process.env, readOverrides(program));

        const table = new Table({
          head: ['Task', 'Description'],
          colWidths: [12, 64],
        });

        for (const task of TASKS) {
          table.push([task.name, task.description]);
        }

        console.log(chalk.bold('Available tasks:\n'));
        console.log(table.toString());
        console.log(chalk.dim(`\nHost:      ${config.host}`));
        console.log(chalk.dim(`Directory: ${config.remoteDirectory}`));
        console.log(chalk.dim(`Service:   ${config.service}`));
      } catch (error) {
        if (error instanceof ValidationError) {
          console.error(chalk.red(`✗ Validation Error: ${error.message}`));
        } else {
          console.error(
            chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`)
          );
        }
        process.exit(1);
      }
    });
}
