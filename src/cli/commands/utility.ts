import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { SSHProvisioner } from '../../classes/provisioner';
import { loadConfig } from '../../lib/config';
import { describeError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { ValidationError } from '../../lib/sanitization';
import { StatusCheck } from '../../interfaces';
import { addConfigOptions, ConfigCommandOptions, toConfigOverrides } from './options';

export function renderStatus(checks: StatusCheck[]): string {
  const table = new Table({
    head: ['Check', 'Status', 'Detail'],
    colWidths: [16, 8, 64],
    wordWrap: true,
  });

  for (const check of checks) {
    table.push([
      check.name,
      check.ok ? chalk.green('OK') : chalk.red('MISSING'),
      check.detail,
    ]);
  }

  return table.toString();
}

export function registerUtilityCommands(program: Command) {
  // example: npx tsx src/cli/index.ts status --host github.com
  addConfigOptions(
    program
      .command('status')
      .description('Show what is already provisioned for the host')
  ).action((options: ConfigCommandOptions) => {
    try {
      const config = loadConfig(toConfigOverrides(options));
      logger.setVerbose(config.verbose);

      console.log(chalk.bold(`📋 SSH provisioning status for ${config.host}`));

      const checks = new SSHProvisioner({ config }).inspect();
      console.log(renderStatus(checks));

      if (checks.some((check) => !check.ok)) {
        console.log(chalk.dim('Run `skp provision` to set up what is missing'));
        process.exitCode = 1;
      }
    } catch (error) {
      if (error instanceof ValidationError) {
        console.error(chalk.red(`✗ Validation Error: ${error.message}`));
      } else {
        console.error(chalk.red(`Error: ${describeError(error)}`));
      }
      process.exit(1);
    }
  });
}
