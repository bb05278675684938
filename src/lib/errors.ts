import { ExecutionResult } from '../interfaces';

/**
 * @description Raised when a local or remote command exits non-zero. Carries
 * the exit status and captured output so the CLI can surface them unchanged.
 */
export class CommandFailedError extends Error {
  public readonly command: string;
  public readonly host: string;
  public readonly exitCode: number;
  public readonly stdout: string;
  public readonly stderr: string;

  constructor(command: string, host: string, result: ExecutionResult) {
    super(
      `Command "${command}" on ${host} failed with exit code ${result.exitCode}`
    );
    this.name = 'CommandFailedError';
    this.command = command;
    this.host = host;
    this.exitCode = result.exitCode;
    this.stdout = result.stdout;
    this.stderr = result.stderr;
  }
}

/**
 * @description The exit status the process should end with for an error.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommandFailedError && error.exitCode > 0) {
    return error.exitCode;
  }
  return 1;
}
