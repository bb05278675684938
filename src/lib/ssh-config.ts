import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import SSHConfig from 'ssh-config';

/**
 * @description Connection settings for a host alias, taken from an OpenSSH
 * client configuration.
 */
export interface ResolvedSSHHost {
  alias: string;
  hostName: string;
  user?: string;
  port?: number;
  identityFile?: string;
}

/**
 * @description Expands a leading `~` to the local home directory.
 */
export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === '~') {
    return home;
  }
  if (filePath.startsWith('~/')) {
    return path.join(home, filePath.slice(2));
  }
  return filePath;
}

/**
 * @description Looks up `key` in a computed ssh config section. OpenSSH
 * keywords are case-insensitive.
 */
function pick(computed: Record<string, unknown>, key: string): string | undefined {
  const wanted = key.toLowerCase();
  for (const [name, value] of Object.entries(computed)) {
    if (name.toLowerCase() !== wanted) continue;
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) {
      const first = value.find((item): item is string => typeof item === 'string');
      if (first !== undefined) return first;
    }
  }
  return undefined;
}

/**
 * @description Resolves a host alias against the text of an ssh config file.
 * Aliases with no matching section resolve to themselves.
 */
export function resolveSSHHost(
  alias: string,
  configText: string,
  home: string = os.homedir()
): ResolvedSSHHost {
  const computed: Record<string, unknown> = SSHConfig.parse(configText).compute(alias);

  const portValue = pick(computed, 'Port');
  const port = portValue ? parseInt(portValue, 10) : undefined;
  const identityFile = pick(computed, 'IdentityFile');

  return {
    alias,
    hostName: pick(computed, 'HostName') ?? alias,
    user: pick(computed, 'User'),
    port: port !== undefined && !isNaN(port) ? port : undefined,
    identityFile: identityFile ? expandHome(identityFile, home) : undefined,
  };
}

/**
 * @description Reads the ssh config file at `configPath` and resolves `alias`
 * against it. A missing file leaves the alias as the hostname.
 */
export function loadSSHHost(alias: string, configPath: string): ResolvedSSHHost {
  const resolvedPath = expandHome(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return { alias, hostName: alias };
  }
  return resolveSSHHost(alias, fs.readFileSync(resolvedPath, 'utf8'));
}
