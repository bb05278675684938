import chalk from 'chalk';
import { CommandInvocation } from '../interfaces';

export type WriteFn = (line: string) => void;

export type OutputStream = 'out' | 'err';

/**
 * Prints task progress as `[host] action: detail` lines.
 */
export class Reporter {
  private write: WriteFn;
  private writeError: WriteFn;
  private pending = new Map<string, string>();

  constructor(
    write: WriteFn = (line) => console.log(line),
    writeError: WriteFn = (line) => console.error(line)
  ) {
    this.write = write;
    this.writeError = writeError;
  }

  taskStarted(host: string, task: string): void {
    this.write(`${this.prefix(host)} Executing task '${task}'`);
  }

  command(invocation: CommandInvocation): void {
    this.write(
      `${this.prefix(invocation.host)} ${chalk.bold(`${invocation.kind}:`)} ${invocation.command}`
    );
  }

  /**
   * Echo a chunk of command output, one prefixed line per output line. A
   * trailing partial line is held until the rest of it arrives or `flush`.
   */
  output(host: string, chunk: string, stream: OutputStream = 'out'): void {
    const key = this.pendingKey(host, stream);
    const parts = `${this.pending.get(key) ?? ''}${chunk}`.split('\n');
    const rest = parts.pop() ?? '';

    if (rest) {
      this.pending.set(key, rest);
    } else {
      this.pending.delete(key);
    }

    for (const line of parts) {
      this.line(host, line.replace(/\r$/, ''), stream);
    }
  }

  /**
   * Print whatever partial line is still held for `host`.
   */
  flush(host: string): void {
    for (const stream of ['out', 'err'] as const) {
      const key = this.pendingKey(host, stream);
      const rest = this.pending.get(key);
      if (rest === undefined) continue;

      this.pending.delete(key);
      this.line(host, rest.replace(/\r$/, ''), stream);
    }
  }

  disconnecting(host: string): void {
    this.write(chalk.dim(`Disconnecting from ${host}... done.`));
  }

  done(): void {
    this.write(chalk.green('\nDone.'));
  }

  failed(message: string, detail?: string): void {
    this.writeError(chalk.red(`\n✗ Fatal error: ${message}`));
    if (detail) {
      this.writeError(detail.trimEnd());
    }
    this.writeError(chalk.red('\nAborting.'));
  }

  private line(host: string, line: string, stream: OutputStream): void {
    const text = `${this.prefix(host)} ${stream}: ${line}`;
    if (stream === 'err') {
      this.writeError(chalk.dim(text));
    } else {
      this.write(chalk.dim(text));
    }
  }

  private pendingKey(host: string, stream: OutputStream): string {
    return `${host}\0${stream}`;
  }

  private prefix(host: string): string {
    return chalk.cyan(`[${host}]`);
  }
}
