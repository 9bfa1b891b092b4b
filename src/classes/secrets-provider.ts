import * as fs from 'fs';
import * as path from 'path';
import { ProvisionerConfig, SecretsProvider } from '../interfaces';
import { isNotFound } from '../lib/errors';
import { sanitizeSecretName } from '../lib/sanitization';

/**
 * Secrets from environment variables, including those dotenv loaded from .env
 */
export class EnvSecretsProvider implements SecretsProvider {
  readonly description = 'environment';
  private env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  get(name: string): string | undefined {
    return this.env[name] ?? this.env[name.toUpperCase()];
  }
}

/**
 * Secrets mounted as one file per secret (Docker and Kubernetes style)
 */
export class FileSecretsProvider implements SecretsProvider {
  readonly description: string;
  private directory: string;

  constructor(directory: string) {
    this.directory = directory;
    this.description = `directory ${directory}`;
  }

  get(name: string): string | undefined {
    const secretPath = path.join(this.directory, sanitizeSecretName(name));

    try {
      return fs.readFileSync(secretPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new Error(`Cannot read secret file ${secretPath}: ${error}`);
    }
  }
}

export function createSecretsProvider(
  config: Pick<ProvisionerConfig, 'secretsDir'>,
  env: NodeJS.ProcessEnv = process.env
): SecretsProvider {
  if (config.secretsDir) {
    return new FileSecretsProvider(config.secretsDir);
  }
  return new EnvSecretsProvider(env);
}
