import * as fs from 'fs';
import * as os from 'os';
import { DeployConfig, RemoteExecutionConfig, SSHConnectionConfig } from '../interfaces';
import {
  sanitizeBoolean,
  sanitizeFilePath,
  sanitizeNumber,
  sanitizeServiceName,
  sanitizeSSHHost,
  sanitizeSSHKeyPath,
  sanitizeSSHUsername,
  sanitizeWorkingDir,
} from './sanitization';
import { expandHome, loadSSHHost, ResolvedSSHHost } from './ssh-config';

export const DEFAULT_HOST = 'lidar.io';
export const DEFAULT_REMOTE_DIRECTORY = '/var/www/glacio';
export const DEFAULT_SERVICE = 'glacio-api';
export const DEFAULT_SHELL = '/bin/bash -l -c';
export const DEFAULT_SSH_CONFIG_PATH = '~/.ssh/config';

export type Env = Record<string, string | undefined>;

/**
 * @description Values given on the command line. They win over the environment.
 */
export interface ConfigOverrides {
  host?: string;
  useSshConfig?: boolean;
}

/**
 * @description Reads the deploy configuration once from the environment and
 * freezes it for the rest of the run.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {}
): Readonly<DeployConfig> {
  const host = sanitizeSSHHost(overrides.host || env.DEPLOY_HOST || DEFAULT_HOST);
  const useSshConfig =
    overrides.useSshConfig ??
    (env.DEPLOY_USE_SSH_CONFIG
      ? sanitizeBoolean(env.DEPLOY_USE_SSH_CONFIG, 'DEPLOY_USE_SSH_CONFIG')
      : true);

  const config: DeployConfig = {
    host,
    useSshConfig,
    sshConfigPath: env.DEPLOY_SSH_CONFIG_PATH || DEFAULT_SSH_CONFIG_PATH,
    remoteDirectory: sanitizeWorkingDir(
      env.DEPLOY_REMOTE_DIR || DEFAULT_REMOTE_DIRECTORY
    ),
    service: sanitizeServiceName(env.DEPLOY_SERVICE || DEFAULT_SERVICE),
    username: env.DEPLOY_SSH_USER
      ? sanitizeSSHUsername(env.DEPLOY_SSH_USER)
      : undefined,
    port: env.DEPLOY_SSH_PORT
      ? sanitizeNumber(env.DEPLOY_SSH_PORT, 'SSH port', 1, 65535)
      : undefined,
    privateKeyPath: env.DEPLOY_SSH_KEY
      ? sanitizeFilePath(expandHome(env.DEPLOY_SSH_KEY), 'SSH key path')
      : undefined,
    passphrase: env.DEPLOY_SSH_PASSPHRASE || undefined,
    agent: env.SSH_AUTH_SOCK || undefined,
    // an empty DEPLOY_SHELL turns wrapping off
    shell: env.DEPLOY_SHELL ?? DEFAULT_SHELL,
    sudoPassword: env.DEPLOY_SUDO_PASSWORD || undefined,
    readyTimeout: env.DEPLOY_SSH_TIMEOUT
      ? sanitizeNumber(env.DEPLOY_SSH_TIMEOUT, 'SSH timeout', 1000, 300000)
      : 20000,
  };

  return Object.freeze(config);
}

/**
 * @description Turns the deploy configuration into the connection settings
 * of the remote executor. Explicit environment values win over the ssh config.
 */
export function buildRemoteConfig(
  config: Readonly<DeployConfig>,
  resolveHost: (alias: string, configPath: string) => ResolvedSSHHost = loadSSHHost
): RemoteExecutionConfig {
  const resolved: ResolvedSSHHost = config.useSshConfig
    ? resolveHost(config.host, config.sshConfigPath)
    : { alias: config.host, hostName: config.host };

  const ssh: SSHConnectionConfig = {
    host: resolved.hostName,
    port: config.port ?? resolved.port ?? 22,
    username: config.username ?? resolved.user ?? os.userInfo().username,
    readyTimeout: config.readyTimeout,
  };

  if (config.agent) {
    ssh.agent = config.agent;
  }

  // an IdentityFile from the ssh config may name a key that was never created
  let keyPath: string | undefined;
  if (config.privateKeyPath) {
    keyPath = sanitizeSSHKeyPath(config.privateKeyPath);
  } else if (resolved.identityFile && fs.existsSync(resolved.identityFile)) {
    keyPath = sanitizeSSHKeyPath(resolved.identityFile);
  }

  if (keyPath) {
    ssh.privateKey = fs.readFileSync(keyPath, 'utf8');
    if (config.passphrase) {
      ssh.passphrase = config.passphrase;
    }
  }

  return {
    label: config.host,
    ssh,
    shell: config.shell || undefined,
    sudoPassword: config.sudoPassword,
  };
}
