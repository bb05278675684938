import { NodeSSH } from 'node-ssh';
import shellEscape from 'shell-escape';
import { StringDecoder } from 'string_decoder';
import {
  CommandOptions,
  ExecutionResult,
  RemoteExecutionConfig,
} from '../interfaces';
import { Reporter } from '../lib/output';

export class RemoteExecutor {
  private ssh: NodeSSH;
  private config: RemoteExecutionConfig;
  private reporter: Reporter;

  constructor(config: RemoteExecutionConfig, reporter: Reporter = new Reporter()) {
    this.ssh = new NodeSSH();
    this.config = config;
    this.reporter = reporter;
  }

  /**
   * Name of the host as it appears in output
   */
  get label(): string {
    return this.config.label ?? this.config.ssh.host;
  }

  isConnected(): boolean {
    return this.ssh.isConnected();
  }

  /**
   * Connect to the remote server
   */
  async connect(): Promise<void> {
    try {
      await this.ssh.connect(this.config.ssh);
    } catch (error) {
      throw new Error(`Failed to connect to remote server: ${error}`);
    }
  }

  /**
   * Disconnect from the remote server
   */
  async disconnect(): Promise<void> {
    try {
      this.ssh.dispose();
    } catch (error) {
      throw new Error(`Failed to disconnect from remote server: ${error}`);
    }
  }

  /**
   * Run a command on the remote server as the connecting user
   */
  async run(command: string, options: CommandOptions = {}): Promise<ExecutionResult> {
    return this.exec(this.buildCommand(command, options));
  }

  /**
   * Run a command on the remote server through sudo
   */
  async sudo(command: string, options: CommandOptions = {}): Promise<ExecutionResult> {
    const stdin = this.config.sudoPassword
      ? `${this.config.sudoPassword}\n`
      : undefined;
    return this.exec(this.buildSudoCommand(command, options), stdin);
  }

  /**
   * Build the full command string: change into `cwd` first, then wrap the
   * whole thing in the configured shell.
   */
  buildCommand(command: string, options: CommandOptions = {}): string {
    const scoped = options.cwd
      ? `cd ${shellEscape([options.cwd])} && ${command}`
      : command;

    if (!this.config.shell) {
      return scoped;
    }

    return `${this.config.shell} ${shellEscape([scoped])}`;
  }

  /**
   * Build the sudo command string. sudo takes a single program, so the
   * command is always wrapped in a shell.
   */
  buildSudoCommand(command: string, options: CommandOptions = {}): string {
    const scoped = options.cwd
      ? `cd ${shellEscape([options.cwd])} && ${command}`
      : command;
    const shell = this.config.shell || 'sh -c';
    const prefix = this.config.sudoPassword ? "sudo -S -p ''" : 'sudo -n';

    return `${prefix} ${shell} ${shellEscape([scoped])}`;
  }

  private async exec(fullCommand: string, stdin?: string): Promise<ExecutionResult> {
    const startTime = Date.now();
    const stdoutDecoder = new StringDecoder('utf8');
    const stderrDecoder = new StringDecoder('utf8');
    let stdout = '';
    let stderr = '';

    // capture from the decoded stream so multi-byte characters split
    // across chunks stay intact
    const onStdout = (text: string) => {
      stdout += text;
      this.reporter.output(this.label, text, 'out');
    };
    const onStderr = (text: string) => {
      stderr += text;
      this.reporter.output(this.label, text, 'err');
    };

    try {
      const result = await this.ssh.execCommand(fullCommand, {
        stdin,
        onStdout: (chunk) => onStdout(stdoutDecoder.write(chunk)),
        onStderr: (chunk) => onStderr(stderrDecoder.write(chunk)),
      });
      onStdout(stdoutDecoder.end());
      onStderr(stderrDecoder.end());

      return {
        // no exit code means the channel closed on a signal
        exitCode: result.code ?? (result.signal ? 1 : 0),
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        duration: Date.now() - startTime,
      };
    } catch (error) {
      throw new Error(`Error executing command on ${this.label}: ${error}`);
    } finally {
      this.reporter.flush(this.label);
    }
  }

  /**
   * Get remote server information
   */
  async getServerInfo(): Promise<{ hostname: string; uptime: string }> {
    const hostnameResult = await this.ssh.execCommand('hostname');
    const uptimeResult = await this.ssh.execCommand('uptime');

    return {
      hostname: hostnameResult.stdout.trim(),
      uptime: uptimeResult.stdout.trim(),
    };
  }

  /**
   * Test the connection to the remote server
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.ssh.execCommand(
        'echo "Connection test successful"'
      );
      return result.code === 0;
    } catch (error) {
      console.error(`Connection test failed: ${error}`);
      return false;
    }
  }
}
