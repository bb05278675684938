import { Command } from 'commander';
import { ConfigOverrides } from '../lib/config';

export type GlobalOptions = {
  host?: string;
  sshConfig?: boolean;
};

/**
 * Read the global flags into config overrides. `--no-ssh-config` only
 * overrides the environment when it is actually given.
 */
export function readOverrides(program: Command): ConfigOverrides {
  const options = program.opts<GlobalOptions>();
  return {
    host: options.host,
    useSshConfig: options.sshConfig === false ? false : undefined,
  };
}
