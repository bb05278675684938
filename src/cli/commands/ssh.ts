import { Command } from 'commander';
import chalk from 'chalk';
import { RemoteExecutor } from '../../classes/remote-executor';
import { buildRemoteConfig, loadConfig } from '../../lib/config';
import { ValidationError } from '../../lib/sanitization';
import { readOverrides } from '../options';

export function registerSSHCommands(program: Command) {
  // example: npx tsx src/cli/index.ts check --host lidar.io
  program
    .command('check')
    .description('Test the SSH connection to the deploy host')
    .action(async () => {
      console.log(chalk.bold('🔐 Testing SSH Connection...'));

      try {
        const config = loadConfig(process.env, readOverrides(program));
        const remoteConfig = buildRemoteConfig(config);
        const { host, port, username } = remoteConfig.ssh;

        console.log(chalk.dim(`Connecting to ${username}@${host}:${port}\n`));

        if (remoteConfig.ssh.privateKey) {
          console.log(chalk.blue('🔑 Using private key authentication'));
        } else if (remoteConfig.ssh.agent) {
          console.log(chalk.blue('🔑 Using ssh-agent authentication'));
        }

        const executor = new RemoteExecutor(remoteConfig);

        console.log(chalk.dim('Establishing connection...'));
        await executor.connect();

        try {
          const isConnected = await executor.testConnection();

          if (!isConnected) {
            console.log(chalk.red('❌ SSH connection test failed'));
            process.exitCode = 1;
            return;
          }

          console.log(chalk.green('✅ SSH connection test successful!'));

          const serverInfo = await executor.getServerInfo();
          console.log(chalk.dim('\n📋 Server Information:'));
          console.log(chalk.cyan(`   Hostname: ${serverInfo.hostname}`));
          console.log(chalk.cyan(`   Uptime: ${serverInfo.uptime}`));
        } finally {
          await executor.disconnect();
          console.log(chalk.dim('Connection closed'));
        }
      } catch (error) {
        if (error instanceof ValidationError) {
          console.error(chalk.red(`✗ Validation Error: ${error.message}`));
        } else {
          console.error(
            chalk.red(
              `❌ SSH connection failed: ${error instanceof Error ? error.message : String(error)}`
            )
          );
        }
        process.exit(1);
      }
    });
}
