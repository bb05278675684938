import { EventEmitter } from 'events';
import * as path from 'path';
import {
  CommandInvocation,
  CommandKind,
  DeployConfig,
  ExecutionResult,
  TaskDefinition,
  TaskName,
  TaskRecord,
} from '../interfaces';
import { CommandFailedError } from '../lib/errors';
import { Reporter } from '../lib/output';
import { LOCAL_HOST, LocalExecutor } from './local-executor';
import { RemoteExecutor } from './remote-executor';

export const PUSH_COMMAND = 'git push';
export const PULL_COMMAND = 'git pull';
export const BUILD_COMMAND = 'cargo build --release --all';
export const TEST_COMMAND = 'cargo test --all';

export function restartCommand(service: string): string {
  return `supervisorctl restart ${service}`;
}

export const TASKS: readonly TaskDefinition[] = [
  { name: 'deploy', description: 'Push, update and restart, stopping at the first failure' },
  { name: 'push', description: 'Push local commits to the code host' },
  { name: 'update', description: 'Pull, build and test in the remote checkout' },
  { name: 'restart', description: 'Restart the supervised service' },
];

export interface TaskRunnerDeps {
  remote: RemoteExecutor;
  local?: LocalExecutor;
  reporter?: Reporter;
}

/**
 * Runs the deploy tasks one after another. Any non-zero exit raises a
 * CommandFailedError and ends the run.
 */
export class TaskRunner extends EventEmitter {
  private config: Readonly<DeployConfig>;
  private remote: RemoteExecutor;
  private local: LocalExecutor;
  private reporter: Reporter;
  private connected = false;
  private directories: string[] = [];
  private records: TaskRecord[] = [];

  constructor(config: Readonly<DeployConfig>, deps: TaskRunnerDeps) {
    super();
    this.config = config;
    this.reporter = deps.reporter ?? new Reporter();
    this.remote = deps.remote;
    this.local = deps.local ?? new LocalExecutor(this.reporter);
  }

  /**
   * Every task entered so far, in the order it was entered.
   */
  get history(): readonly TaskRecord[] {
    return this.records;
  }

  /**
   * The remote directory commands currently run in, if any.
   */
  get cwd(): string | undefined {
    return this.directories[this.directories.length - 1];
  }

  listTasks(): readonly TaskDefinition[] {
    return TASKS;
  }

  async deploy(): Promise<void> {
    await this.task(
      'deploy',
      async () => {
        await this.push();
        await this.update();
        await this.restart();
      },
      ['push', 'update', 'restart']
    );
  }

  async push(): Promise<void> {
    await this.task('push', async () => {
      await this.localCommand(PUSH_COMMAND);
    });
  }

  async update(): Promise<void> {
    await this.task('update', async () => {
      await this.cd(this.config.remoteDirectory, async () => {
        await this.runCommand(PULL_COMMAND);
        await this.runCommand(BUILD_COMMAND);
        await this.runCommand(TEST_COMMAND);
      });
    });
  }

  async restart(): Promise<void> {
    await this.task('restart', async () => {
      await this.sudoCommand(restartCommand(this.config.service));
    });
  }

  async runTask(name: TaskName): Promise<void> {
    switch (name) {
      case 'deploy':
        return this.deploy();
      case 'push':
        return this.push();
      case 'update':
        return this.update();
      case 'restart':
        return this.restart();
    }
  }

  /**
   * Run the named tasks in order, then close the connection whatever the
   * outcome.
   */
  async runTasks(names: readonly TaskName[]): Promise<void> {
    try {
      for (const name of names) {
        await this.runTask(name);
      }
    } finally {
      await this.close();
    }
    this.reporter.done();
  }

  async close(): Promise<void> {
    if (!this.connected) return;

    this.connected = false;
    await this.remote.disconnect();
    this.reporter.disconnecting(this.remote.label);
  }

  /**
   * Scope remote commands to `directory`. Relative paths nest inside the
   * enclosing directory. The previous directory is restored on exit.
   */
  async cd<T>(directory: string, fn: () => Promise<T>): Promise<T> {
    const current = this.cwd;
    const next =
      current && !path.posix.isAbsolute(directory)
        ? path.posix.join(current, directory)
        : directory;

    this.directories.push(next);
    try {
      return await fn();
    } finally {
      this.directories.pop();
    }
  }

  /**
   * Run `fn` as task `name`. The `subtasks` it will run are recorded as
   * pending up front, so a failed run shows which steps never started.
   */
  private async task(
    name: TaskName,
    fn: () => Promise<void>,
    subtasks: readonly TaskName[] = []
  ): Promise<void> {
    let record = this.records.find(
      (candidate) => candidate.name === name && candidate.status === 'pending'
    );
    if (!record) {
      record = { name, status: 'pending' };
      this.records.push(record);
    }
    record.status = 'running';
    record.startedAt = new Date();

    for (const subtask of subtasks) {
      this.records.push({ name: subtask, status: 'pending' });
    }

    this.reporter.taskStarted(this.remote.label, name);
    this.emit('taskStarted', name);

    try {
      await fn();
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      record.status = 'failed';
      record.error = error;
      record.finishedAt = new Date();
      this.emit('taskFailed', name, error);
      throw error;
    }

    record.status = 'succeeded';
    record.finishedAt = new Date();
    this.emit('taskSucceeded', name);
  }

  private async localCommand(command: string): Promise<ExecutionResult> {
    return this.execute('local', LOCAL_HOST, command, undefined, () =>
      this.local.run(command)
    );
  }

  private async runCommand(command: string): Promise<ExecutionResult> {
    const cwd = this.cwd;
    return this.execute('run', this.remote.label, command, cwd, async () => {
      await this.ensureConnected();
      return this.remote.run(command, { cwd });
    });
  }

  private async sudoCommand(command: string): Promise<ExecutionResult> {
    const cwd = this.cwd;
    return this.execute('sudo', this.remote.label, command, cwd, async () => {
      await this.ensureConnected();
      return this.remote.sudo(command, { cwd });
    });
  }

  private async execute(
    kind: CommandKind,
    host: string,
    command: string,
    cwd: string | undefined,
    exec: () => Promise<ExecutionResult>
  ): Promise<ExecutionResult> {
    const invocation: CommandInvocation = { kind, host, command, cwd };
    this.reporter.command(invocation);
    this.emit('commandStarted', invocation);

    const result = await exec();
    this.emit('commandFinished', invocation, result);

    if (result.exitCode !== 0) {
      throw new CommandFailedError(command, host, result);
    }

    return result;
  }

  private async ensureConnected(): Promise<void> {
    if (this.connected) return;

    await this.remote.connect();
    this.connected = true;
  }
}
