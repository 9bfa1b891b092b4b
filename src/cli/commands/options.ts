import { Command } from 'commander';
import { ConfigOverrides } from '../../lib/config';

/**
 * @description Options shared by every command that reads the provisioner configuration.
 */
export function addConfigOptions(command: Command): Command {
  return command
    .option('-s, --secret <name>', 'Secret holding the private key (default: id_rsa_github)')
    .option('-H, --host <host>', 'Code host to configure (default: github.com)')
    .option('-p, --port <port>', 'SSH port (default: 22)')
    .option('-u, --user <user>', 'Login user for the config stanza (default: git)')
    .option('--ssh-dir <path>', 'SSH directory (default: ~/.ssh)')
    .option('--key-file <name>', 'Private key file name (default: the secret name)')
    .option('--secrets-dir <path>', 'Read secrets from files in this directory')
    .option('--timeout <ms>', 'Deadline per external command, 0 for none (default: 30000)')
    .option('-v, --verbose', 'Print the commands being run');
}

export interface ConfigCommandOptions {
  secret?: string;
  host?: string;
  port?: string;
  user?: string;
  sshDir?: string;
  keyFile?: string;
  secretsDir?: string;
  timeout?: string;
  verbose?: boolean;
  hash?: boolean;
  reuseAgent?: boolean;
}

/**
 * @description Maps commander option names onto config overrides.
 * Negatable flags only override the environment when given.
 */
export function toConfigOverrides(options: ConfigCommandOptions): ConfigOverrides {
  return {
    secretName: options.secret,
    host: options.host,
    port: options.port,
    user: options.user,
    sshDir: options.sshDir,
    keyFileName: options.keyFile,
    secretsDir: options.secretsDir,
    timeout: options.timeout,
    verbose: options.verbose,
    hashKnownHosts: options.hash === false ? false : undefined,
    reuseAgent: options.reuseAgent === false ? false : undefined,
  };
}
