import { Command } from 'commander';
import chalk from 'chalk';
import { RemoteExecutor } from '../../classes/remote-executor';
import { TASKS, TaskRunner } from '../../classes/task-runner';
import { buildRemoteConfig, loadConfig } from '../../lib/config';
import { CommandFailedError, exitCodeFor } from '../../lib/errors';
import { Reporter } from '../../lib/output';
import { sanitizeTaskName, ValidationError } from '../../lib/sanitization';
import { readOverrides } from '../options';

async function runFromCli(program: Command, names: string[]): Promise<void> {
  const reporter = new Reporter();

  try {
    const tasks = names.map(sanitizeTaskName);
    const config = loadConfig(process.env, readOverrides(program));
    const remote = new RemoteExecutor(buildRemoteConfig(config), reporter);
    const runner = new TaskRunner(config, { remote, reporter });

    await runner.runTasks(tasks);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(chalk.red(`✗ Validation Error: ${error.message}`));
    } else if (error instanceof CommandFailedError) {
      reporter.failed(error.message, error.stderr || error.stdout);
    } else {
      reporter.failed(error instanceof Error ? error.message : String(error));
    }
    process.exit(exitCodeFor(error));
  }
}

export function registerTaskCommands(program: Command) {
  // example: npx tsx src/cli/index.ts deploy --host lidar.io
  for (const task of TASKS) {
    program
      .command(task.name)
      .description(task.description)
      .action(async () => {
        await runFromCli(program, [task.name]);
      });
  }

  // example: npx tsx src/cli/index.ts run push restart
  program
    .command('run')
    .description('Run several tasks in order, stopping at the first failure')
    .argument('<tasks...>', 'Task names')
    .action(async (tasks: string[]) => {
      await runFromCli(program, tasks);
    });
}
