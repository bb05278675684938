import { spawn } from 'child_process';
import { CommandOptions, ExecutionResult } from '../interfaces';
import { Reporter } from '../lib/output';

export const LOCAL_HOST = 'localhost';

/**
 * Runs commands on the invoking machine through the system shell.
 */
export class LocalExecutor {
  private reporter: Reporter;

  constructor(reporter: Reporter = new Reporter()) {
    this.reporter = reporter;
  }

  async run(command: string, options: CommandOptions = {}): Promise<ExecutionResult> {
    const startTime = Date.now();

    return new Promise<ExecutionResult>((resolve, reject) => {
      const child = spawn(command, {
        cwd: options.cwd ?? process.cwd(),
        shell: true,
        stdio: ['inherit', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      // characters split across chunks are joined by the stream decoder
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (text: string) => {
        stdout += text;
        this.reporter.output(LOCAL_HOST, text, 'out');
      });

      child.stderr.on('data', (text: string) => {
        stderr += text;
        this.reporter.output(LOCAL_HOST, text, 'err');
      });

      child.on('error', (error) => {
        reject(new Error(`Failed to run local command "${command}": ${error.message}`));
      });

      child.on('close', (code, signal) => {
        this.reporter.flush(LOCAL_HOST);
        resolve({
          exitCode: code ?? (signal ? 1 : 0),
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          duration: Date.now() - startTime,
        });
      });
    });
  }
}
