export type TaskName = 'deploy' | 'push' | 'update' | 'restart';

export type TaskStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export interface TaskRecord {
  /**
   * @description The name of the task.
   */
  name: TaskName;
  /**
   * @description Where the task is in its lifecycle. `failed` is terminal for the run.
   */
  status: TaskStatus;
  startedAt?: Date;
  finishedAt?: Date;
  /**
   * @description The error that failed the task.
   */
  error?: Error;
}

export interface TaskDefinition {
  name: TaskName;
  description: string;
}

export type CommandKind = 'local' | 'run' | 'sudo';

export interface CommandInvocation {
  /**
   * @description How the command was issued.
   */
  kind: CommandKind;
  /**
   * @description The host the command ran on, `localhost` for local commands.
   */
  host: string;
  command: string;
  cwd?: string;
}
