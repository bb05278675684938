export interface DeployConfig {
  /**
   * @description The remote host, either an SSH config alias or a hostname.
   */
  host: string;
  /**
   * @description Resolve the host through the user's SSH client configuration.
   */
  useSshConfig: boolean;
  sshConfigPath: string;
  /**
   * @description Absolute path of the checkout on the remote host.
   */
  remoteDirectory: string;
  /**
   * @description Name of the supervised program restarted at the end of a deploy.
   */
  service: string;
  username?: string;
  port?: number;
  privateKeyPath?: string;
  passphrase?: string;
  agent?: string;
  shell: string;
  sudoPassword?: string;
  readyTimeout: number;
}
