import * as os from 'os';
import * as path from 'path';
import { ProvisionerConfig } from '../interfaces';
import {
  sanitizeBoolean,
  sanitizeDirectoryPath,
  sanitizeExecutable,
  sanitizeFileName,
  sanitizeNumber,
  sanitizeSecretName,
  sanitizeSSHHost,
  sanitizeSSHUsername,
} from './sanitization';

export const DEFAULT_SECRET_NAME = 'id_rsa_github';
export const DEFAULT_HOST = 'github.com';
export const DEFAULT_USER = 'git';
export const DEFAULT_COMMAND_TIMEOUT_MS = 30000;

/**
 * Values given on the command line. They win over SKP_* environment variables.
 */
export interface ConfigOverrides {
  secretName?: string;
  host?: string;
  port?: string;
  user?: string;
  sshDir?: string;
  keyFileName?: string;
  secretsDir?: string;
  hashKnownHosts?: boolean;
  reuseAgent?: boolean;
  timeout?: string;
  verbose?: boolean;
}

/**
 * @description Builds the provisioner configuration from CLI overrides and the environment.
 * @throws ValidationError when a value does not pass its sanitizer.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ProvisionerConfig {
  const secretName = sanitizeSecretName(
    overrides.secretName ?? env.SKP_SECRET_NAME ?? DEFAULT_SECRET_NAME
  );

  const secretsDirValue = overrides.secretsDir ?? env.SKP_SECRETS_DIR;

  return {
    secretName,
    host: sanitizeSSHHost(overrides.host ?? env.SKP_HOST ?? DEFAULT_HOST),
    port: sanitizeNumber(overrides.port ?? env.SKP_PORT ?? '22', 'port', 1, 65535),
    user: sanitizeSSHUsername(overrides.user ?? env.SKP_USER ?? DEFAULT_USER),
    sshDir: sanitizeDirectoryPath(
      overrides.sshDir ?? env.SKP_SSH_DIR ?? path.join(os.homedir(), '.ssh'),
      'SSH directory'
    ),
    keyFileName: sanitizeFileName(
      overrides.keyFileName ?? env.SKP_KEY_FILE ?? secretName,
      'key file name'
    ),
    secretsDir: secretsDirValue
      ? sanitizeDirectoryPath(secretsDirValue, 'secrets directory')
      : undefined,
    hashKnownHosts:
      overrides.hashKnownHosts ??
      sanitizeBoolean(env.SKP_HASH_KNOWN_HOSTS ?? 'true', 'SKP_HASH_KNOWN_HOSTS'),
    reuseAgent:
      overrides.reuseAgent ??
      sanitizeBoolean(env.SKP_REUSE_AGENT ?? 'true', 'SKP_REUSE_AGENT'),
    commandTimeoutMs: sanitizeNumber(
      overrides.timeout ??
        env.SKP_COMMAND_TIMEOUT ??
        String(DEFAULT_COMMAND_TIMEOUT_MS),
      'command timeout',
      0,
      3600000
    ),
    verbose:
      overrides.verbose ??
      sanitizeBoolean(env.SKP_VERBOSE ?? 'false', 'SKP_VERBOSE'),
    utilities: {
      keyscan: sanitizeExecutable(env.SKP_SSH_KEYSCAN ?? 'ssh-keyscan', 'SKP_SSH_KEYSCAN'),
      keygen: sanitizeExecutable(env.SKP_SSH_KEYGEN ?? 'ssh-keygen', 'SKP_SSH_KEYGEN'),
      agent: sanitizeExecutable(env.SKP_SSH_AGENT ?? 'ssh-agent', 'SKP_SSH_AGENT'),
      add: sanitizeExecutable(env.SKP_SSH_ADD ?? 'ssh-add', 'SKP_SSH_ADD'),
    },
  };
}
