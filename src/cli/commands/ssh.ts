import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { AgentSession } from '../../classes/agent-session';
import { ConnectionTester } from '../../classes/connection-tester';
import { KnownHostsFile } from '../../classes/known-hosts';
import { loadConfig } from '../../lib/config';
import { describeError } from '../../lib/errors';
import { ValidationError } from '../../lib/sanitization';
import { SSHConnectionConfig } from '../../interfaces';
import { addConfigOptions, ConfigCommandOptions, toConfigOverrides } from './options';

export function registerSSHCommands(program: Command) {
  // example: npx tsx src/cli/index.ts ssh-test --host github.com --user git
  addConfigOptions(
    program
      .command('ssh-test')
      .description('Check that the provisioned key authenticates against the host')
  ).action(async (options: ConfigCommandOptions) => {
    console.log(chalk.bold('🔐 Testing SSH Connection...'));

    try {
      const config = loadConfig(toConfigOverrides(options));
      const keyPath = path.join(config.sshDir, config.keyFileName);
      const knownHostsPath = path.join(config.sshDir, 'known_hosts');

      if (!fs.existsSync(keyPath)) {
        throw new Error(
          `Private key file not found: ${keyPath}. Run \`skp provision\` first`
        );
      }

      const trustedHostKeys = fs.existsSync(knownHostsPath)
        ? KnownHostsFile.parse(fs.readFileSync(knownHostsPath, 'utf8')).keysFor(
            config.host,
            config.port
          )
        : [];
      if (trustedHostKeys.length === 0) {
        throw new Error(
          `${config.host} is not in ${knownHostsPath}. Run \`skp provision\` first`
        );
      }

      const sshConfig: SSHConnectionConfig = {
        host: config.host,
        port: config.port,
        username: config.user,
        privateKeyPath: keyPath,
        agentSocket: AgentSession.fromEnvironment(process.env)?.socket,
        readyTimeout: config.commandTimeoutMs || undefined,
        trustedHostKeys,
      };

      console.log(
        chalk.dim(`Connecting to ${config.user}@${config.host}:${config.port}\n`)
      );

      const tester = new ConnectionTester(sshConfig);

      console.log(chalk.dim('Establishing connection...'));
      await tester.connect();

      if (tester.isConnected()) {
        console.log(chalk.green('✅ SSH connection test successful!'));
        console.log(chalk.cyan(`   Authenticated as ${config.user} with ${keyPath}`));
      } else {
        console.log(chalk.red('❌ SSH connection test failed'));
        process.exit(1);
      }

      await tester.disconnect();
      console.log(chalk.dim('Connection closed'));
    } catch (error) {
      if (error instanceof ValidationError) {
        console.error(chalk.red(`✗ Validation Error: ${error.message}`));
      } else {
        console.error(
          chalk.red(`❌ SSH connection failed: ${describeError(error)}`)
        );
      }
      process.exit(1);
    }
  });
}
