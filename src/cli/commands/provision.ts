import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { SSHProvisioner } from '../../classes/provisioner';
import { loadConfig } from '../../lib/config';
import { describeError } from '../../lib/errors';
import { Logger } from '../../lib/logger';
import { ValidationError } from '../../lib/sanitization';
import { StepReport } from '../../interfaces';
import { addConfigOptions, ConfigCommandOptions, toConfigOverrides } from './options';

interface ProvisionCommandOptions extends ConfigCommandOptions {
  printEnv?: boolean;
}

function colorStatus(status: StepReport['status']): string {
  switch (status) {
    case 'done':
      return chalk.green(status);
    case 'skipped':
      return chalk.blue(status);
    case 'failed':
      return chalk.red(status);
  }
}

export function renderSteps(steps: StepReport[]): string {
  const table = new Table({
    head: ['Step', 'Status', 'Detail'],
    colWidths: [18, 10, 60],
    wordWrap: true,
  });

  for (const report of steps) {
    table.push([report.step, colorStatus(report.status), report.detail ?? '-']);
  }

  return table.toString();
}

export function registerProvisionCommands(program: Command) {
  // example: npx tsx src/cli/index.ts provision --secret id_rsa_github --host github.com
  // example: eval "$(npx tsx src/cli/index.ts provision --print-env)"
  addConfigOptions(
    program
      .command('provision')
      .description(
        'Write the private key from the secrets store, trust the host, configure ssh and load the key into an agent'
      )
  )
    .option('--no-hash', 'Store the host name in known_hosts unhashed')
    .option('--no-reuse-agent', 'Always start a new ssh-agent')
    .option(
      '--print-env',
      'Print only the agent variables as shell statements (diagnostics go to stderr)'
    )
    .action((options: ProvisionCommandOptions) => {
      try {
        const config = loadConfig(toConfigOverrides(options));
        // with --print-env stdout carries only the shell statements
        const logger = new Logger({
          verbose: config.verbose,
          stderr: options.printEnv,
        });

        logger.info(
          chalk.bold(`🔐 Provisioning SSH access to ${config.host}...`)
        );

        const provisioner = new SSHProvisioner({ config, logger });
        const result = provisioner.provision();

        logger.info('');
        logger.info(renderSteps(result.steps));

        if (!result.success) {
          console.error(
            chalk.red(`✗ Provisioning failed (${result.error.kind})`)
          );
          process.exit(1);
        }

        if (options.printEnv) {
          process.stdout.write(`${result.session.toShellExports()}\n`);
        } else if (!result.session.reused) {
          logger.info(
            chalk.dim(
              '\nThe agent variables apply to commands started by this tool only. To use the agent in your shell:'
            )
          );
          logger.info(chalk.cyan(result.session.toShellExports()));
        }
      } catch (error) {
        if (error instanceof ValidationError) {
          console.error(chalk.red(`✗ Validation Error: ${error.message}`));
        } else {
          console.error(
            chalk.red(`✗ Error provisioning: ${describeError(error)}`)
          );
        }
        process.exit(1);
      }
    });
}
