#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerProvisionCommands } from './commands/provision';
import { registerUtilityCommands } from './commands/utility';
import { registerSSHCommands } from './commands/ssh';
import chalk from 'chalk';
import { describeError } from '../lib/errors';

const program = new Command();

program
  .name('skp')
  .description(
    'SSH key provisioner - set up SSH access to a code host from a stored private key'
  );

registerProvisionCommands(program);
registerUtilityCommands(program);
registerSSHCommands(program);

program.on('error', (error: unknown) => {
  console.error(chalk.red(`✗ Error: ${describeError(error)}`));
  process.exit(1);
});

program.parse();
