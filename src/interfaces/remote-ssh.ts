export interface SSHConnectionConfig {
  host: string;
  port?: number; // default 22
  username: string;

  // any of agent, privateKey or password may authenticate the session
  agent?: string;
  password?: string;
  privateKey?: string;
  passphrase?: string; // only used together with privateKey
  readyTimeout?: number;
}

export interface RemoteExecutionConfig {
  /**
   * @description How the host is named in output, usually the alias it was configured with.
   */
  label?: string;
  ssh: SSHConnectionConfig;
  /**
   * @description Wrapper shell for every remote command, e.g. `/bin/bash -l -c`.
   */
  shell?: string;
  /**
   * @description Password fed to `sudo -S` on stdin.
   */
  sudoPassword?: string;
}

export interface CommandOptions {
  /**
   * @description Directory the command runs in.
   */
  cwd?: string;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
}
