import * as fs from 'fs';
import * as path from 'path';
import {
  CommandResult,
  CommandRunner,
  KeyFingerprint,
  ProvisionerConfig,
  ProvisionResult,
  ProvisionStep,
  SecretsProvider,
  StatusCheck,
  StepReport,
  StepStatus,
  UtilityPaths,
} from '../interfaces';
import { describeCommand, SpawnCommandRunner } from '../lib/command-runner';
import {
  describeError,
  isMissingPath,
  isNotFound,
  ProvisionError,
  ProvisionErrorKind,
} from '../lib/errors';
import { Logger, logger as defaultLogger } from '../lib/logger';
import { looksLikePrivateKey, normalizeKeyMaterial } from '../lib/sanitization';
import { AgentSession } from './agent-session';
import { formatHostName, KnownHostsFile } from './known-hosts';
import { createSecretsProvider } from './secrets-provider';
import { SshConfigFile } from './ssh-config';

export const DIRECTORY_MODE = 0o700;
export const KEY_FILE_MODE = 0o600;

const UTILITY_NAMES: Record<keyof UtilityPaths, string> = {
  keyscan: 'ssh-keyscan',
  keygen: 'ssh-keygen',
  agent: 'ssh-agent',
  add: 'ssh-add',
};

export interface SSHProvisionerOptions {
  config: ProvisionerConfig;
  /**
   * @description Defaults to the provider the config selects.
   */
  secrets?: SecretsProvider;
  runner?: CommandRunner;
  logger?: Logger;
  /**
   * @description Base environment for the utilities; also where a running agent is looked up.
   */
  env?: NodeJS.ProcessEnv;
}

interface StepOutcome<T> {
  value: T;
  status: Exclude<StepStatus, 'failed'>;
  detail?: string;
}

/**
 * @description Parses the first line of `ssh-keygen -l`, e.g.
 * `256 SHA256:abc user@host (ED25519)`. Unrecognised output keeps only `raw`.
 */
export function parseFingerprint(stdout: string): KeyFingerprint {
  const raw =
    stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0) ?? '';

  const match = /^(\d+)\s+(\S+)\s+(.*?)\s*\(([^)]+)\)$/.exec(raw);
  if (!match) {
    return { raw };
  }

  return {
    bits: parseInt(match[1], 10),
    hash: match[2],
    comment: match[3].length > 0 ? match[3] : undefined,
    type: match[4],
    raw,
  };
}

function formatMode(mode: number): string {
  return `0${(mode & 0o777).toString(8).padStart(3, '0')}`;
}

/**
 * Sets up SSH access to a code host from a private key held in a secrets
 * store. Steps run in order and the first failure stops the run; steps that
 * already completed are left in place.
 */
export class SSHProvisioner {
  private config: ProvisionerConfig;
  private secrets: SecretsProvider;
  private runner: CommandRunner;
  private logger: Logger;
  private env: NodeJS.ProcessEnv;

  constructor(options: SSHProvisionerOptions) {
    this.config = options.config;
    this.env = options.env ?? process.env;
    this.secrets =
      options.secrets ?? createSecretsProvider(options.config, this.env);
    this.runner = options.runner ?? new SpawnCommandRunner();
    this.logger = options.logger ?? defaultLogger;
  }

  get keyPath(): string {
    return path.join(this.config.sshDir, this.config.keyFileName);
  }

  get knownHostsPath(): string {
    return path.join(this.config.sshDir, 'known_hosts');
  }

  get configPath(): string {
    return path.join(this.config.sshDir, 'config');
  }

  /**
   * @description Runs every step. Failures come back as `success: false`
   * with a typed error; nothing is thrown.
   */
  provision(secretName: string = this.config.secretName): ProvisionResult {
    const steps: StepReport[] = [];

    try {
      const material = this.runStep(steps, 'fetch-secret', 'SecretUnavailable', () =>
        this.fetchSecret(secretName)
      );
      this.runStep(steps, 'ensure-directory', 'FilesystemError', () =>
        this.ensureDirectory()
      );
      this.runStep(steps, 'write-key', 'FilesystemError', () =>
        this.writeKey(material)
      );
      this.runStep(steps, 'trust-host', 'FilesystemError', () =>
        this.trustHost()
      );
      this.runStep(steps, 'configure-client', 'FilesystemError', () =>
        this.configureClient()
      );
      const fingerprint = this.runStep(steps, 'verify-key', 'UtilityInvocationError', () =>
        this.verifyKey(secretName)
      );
      const session = this.runStep(steps, 'load-agent', 'UtilityInvocationError', () =>
        this.loadAgent()
      );

      this.logger.success(
        `SSH key setup complete. You can test it with \`ssh -T ${this.config.user}@${this.config.host}\`.`
      );

      return {
        success: true,
        keyPath: this.keyPath,
        fingerprint,
        session,
        steps,
      };
    } catch (error) {
      if (!(error instanceof ProvisionError)) {
        throw error;
      }

      this.logger.error(error.message);
      if (error.stderr) {
        this.logger.error(`Stderr: ${error.stderr}`);
      }
      if (error.remediation) {
        this.logger.warn(error.remediation);
      }

      return { success: false, error, steps };
    }
  }

  /**
   * @description Read-only report on what a previous run left behind.
   */
  inspect(): StatusCheck[] {
    const checks: StatusCheck[] = [];
    const { host, port } = this.config;

    const dirStat = this.statOrNull(this.config.sshDir);
    checks.push(
      !dirStat || !dirStat.isDirectory()
        ? { name: 'SSH directory', ok: false, detail: `${this.config.sshDir} missing` }
        : {
            name: 'SSH directory',
            ok: (dirStat.mode & 0o077) === 0,
            detail: `${this.config.sshDir} (${formatMode(dirStat.mode)})`,
          }
    );

    const keyStat = this.statOrNull(this.keyPath);
    checks.push(
      !keyStat || !keyStat.isFile()
        ? { name: 'Private key', ok: false, detail: `${this.keyPath} missing` }
        : {
            name: 'Private key',
            ok: (keyStat.mode & 0o077) === 0,
            detail: `${this.keyPath} (${formatMode(keyStat.mode)})`,
          }
    );

    const knownHosts = KnownHostsFile.parse(this.readIfExists(this.knownHostsPath));
    const hostEntries = knownHosts.entriesFor(host, port);
    checks.push({
      name: 'Known hosts',
      ok: hostEntries.length > 0,
      detail:
        hostEntries.length > 0
          ? `${hostEntries.length} key(s) for ${formatHostName(host, port)}`
          : `${formatHostName(host, port)} not trusted`,
    });

    const sshConfig = SshConfigFile.parse(this.readIfExists(this.configPath));
    checks.push({
      name: 'Client config',
      ok: sshConfig.hasHost(host),
      detail: sshConfig.hasHost(host)
        ? `Host ${host} in ${this.configPath}`
        : `no Host ${host} stanza`,
    });

    const session = AgentSession.fromEnvironment(this.env);
    const listing = session ? this.listAgentKeys(session) : null;
    checks.push({
      name: 'SSH agent',
      ok: listing !== null,
      detail: !session
        ? 'SSH_AUTH_SOCK not set'
        : listing !== null
          ? `reachable at ${session.socket}`
          : `unreachable at ${session.socket}`,
    });

    if (listing !== null && keyStat) {
      const hash = this.fingerprintOrNull()?.hash;
      const loaded = hash !== undefined && listing.includes(hash);
      checks.push({
        name: 'Key loaded',
        ok: loaded,
        detail: hash !== undefined && loaded ? hash : 'not in agent',
      });
    }

    return checks;
  }

  private runStep<T>(
    steps: StepReport[],
    step: ProvisionStep,
    fallbackKind: ProvisionErrorKind,
    action: () => StepOutcome<T>
  ): T {
    this.logger.debug(`→ ${step}`);

    try {
      const outcome = action();
      steps.push({ step, status: outcome.status, detail: outcome.detail });
      return outcome.value;
    } catch (error) {
      const failure =
        error instanceof ProvisionError
          ? error
          : new ProvisionError(fallbackKind, `${step} failed: ${describeError(error)}`, {
              step,
              cause: error,
            });
      steps.push({ step, status: 'failed', detail: failure.message });
      throw failure;
    }
  }

  private fetchSecret(name: string): StepOutcome<string> {
    const remediation = `Add your SSH private key to the ${this.secrets.description} under the name '${name}'.`;

    let raw: string | undefined;
    try {
      raw = this.secrets.get(name);
    } catch (error) {
      throw new ProvisionError(
        'SecretUnavailable',
        `Error retrieving '${name}' from ${this.secrets.description}: ${describeError(error)}`,
        { step: 'fetch-secret', remediation, cause: error }
      );
    }

    if (raw === undefined) {
      throw new ProvisionError(
        'SecretUnavailable',
        `Secret '${name}' was not found in ${this.secrets.description}`,
        { step: 'fetch-secret', remediation }
      );
    }

    let material: string;
    try {
      material = normalizeKeyMaterial(raw);
    } catch (error) {
      throw new ProvisionError('SecretUnavailable', `Secret '${name}' is empty`, {
        step: 'fetch-secret',
        remediation,
        cause: error,
      });
    }

    if (!looksLikePrivateKey(material)) {
      this.logger.warn(
        `Secret '${name}' has no private key header; ssh-keygen will tell whether it is usable`
      );
    }

    return {
      value: material,
      status: 'done',
      detail: `'${name}' from ${this.secrets.description}`,
    };
  }

  private ensureDirectory(): StepOutcome<void> {
    const dir = this.config.sshDir;
    const existed = fs.existsSync(dir);

    try {
      fs.mkdirSync(dir, { recursive: true, mode: DIRECTORY_MODE });
    } catch (error) {
      throw new ProvisionError(
        'FilesystemError',
        `Cannot create SSH directory ${dir}: ${describeError(error)}`,
        { step: 'ensure-directory', cause: error }
      );
    }

    return existed
      ? { value: undefined, status: 'skipped', detail: `${dir} exists` }
      : { value: undefined, status: 'done', detail: `created ${dir} (0700)` };
  }

  private writeKey(material: string): StepOutcome<void> {
    try {
      fs.writeFileSync(this.keyPath, material, { mode: KEY_FILE_MODE });
      fs.chmodSync(this.keyPath, KEY_FILE_MODE);
    } catch (error) {
      throw new ProvisionError(
        'FilesystemError',
        `Cannot write private key ${this.keyPath}: ${describeError(error)}`,
        { step: 'write-key', cause: error }
      );
    }

    return { value: undefined, status: 'done', detail: `${this.keyPath} (0600)` };
  }

  private trustHost(): StepOutcome<void> {
    const { host, port, hashKnownHosts } = this.config;
    const label = formatHostName(host, port);
    const existing = this.readOrCreate(this.knownHostsPath, 'trust-host');

    if (KnownHostsFile.parse(existing).hasHost(host, port)) {
      this.logger.info(`${label} already in known_hosts.`);
      return { value: undefined, status: 'skipped', detail: `${label} already trusted` };
    }

    this.logger.info(`Adding ${label} to known_hosts...`);
    const args = [
      ...(hashKnownHosts ? ['-H'] : []),
      ...(port !== 22 ? ['-p', String(port)] : []),
      host,
    ];
    const result = this.runUtility('trust-host', 'keyscan', args);

    const scanned = KnownHostsFile.parse(result.stdout).entriesFor(host, port);
    if (scanned.length === 0) {
      throw new ProvisionError(
        'MalformedUtilityOutput',
        `ssh-keyscan returned no host keys for ${label}`,
        {
          step: 'trust-host',
          utility: UTILITY_NAMES.keyscan,
          stderr: result.stderr.trim() || undefined,
          remediation: `Check that ${host} is reachable on port ${port}.`,
        }
      );
    }

    const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
    const block = result.stdout.endsWith('\n') ? result.stdout : `${result.stdout}\n`;
    this.appendOrThrow(this.knownHostsPath, separator + block, 'trust-host');

    return {
      value: undefined,
      status: 'done',
      detail: `${scanned.length} key(s) for ${label}`,
    };
  }

  private configureClient(): StepOutcome<void> {
    const { host, port, user } = this.config;
    const existing = this.readOrCreate(this.configPath, 'configure-client');

    if (SshConfigFile.parse(existing).hasHost(host)) {
      this.logger.info(`SSH configuration for ${host} already exists in ${this.configPath}.`);
      return { value: undefined, status: 'skipped', detail: `Host ${host} present` };
    }

    const stanza = SshConfigFile.renderStanza({
      host,
      port,
      identityFile: this.keyPath,
      user,
    });
    this.appendOrThrow(
      this.configPath,
      SshConfigFile.separatorFor(existing) + stanza,
      'configure-client'
    );

    return { value: undefined, status: 'done', detail: `Host ${host} → ${user}` };
  }

  private verifyKey(secretName: string): StepOutcome<KeyFingerprint> {
    this.logger.info(`Verifying SSH key at ${this.keyPath}...`);

    const result = this.runUtility(
      'verify-key',
      'keygen',
      ['-l', '-f', this.keyPath],
      `This might indicate an issue with the key's format or content. Please check your '${secretName}' secret.`
    );

    const fingerprint = parseFingerprint(result.stdout);
    this.logger.info('SSH key fingerprint:');
    this.logger.info(result.stdout.trim());

    return {
      value: fingerprint,
      status: 'done',
      detail: fingerprint.hash ?? fingerprint.raw,
    };
  }

  private loadAgent(): StepOutcome<AgentSession> {
    this.logger.info('Attempting to start ssh-agent and add SSH key...');
    const session = this.ensureAgent();

    const result = this.runUtility(
      'load-agent',
      'add',
      [this.keyPath],
      undefined,
      session.toEnv(this.env)
    );

    if (result.stdout.trim()) {
      this.logger.info(`ssh-add stdout: ${result.stdout.trim()}`);
    }
    if (result.stderr.trim()) {
      this.logger.info(`ssh-add stderr: ${result.stderr.trim()}`);
    }
    this.logger.success('SSH key added to agent successfully.');

    return {
      value: session,
      status: 'done',
      detail: session.reused
        ? `reused agent at ${session.socket}`
        : `agent ${session.pid ?? '?'} at ${session.socket}`,
    };
  }

  private ensureAgent(): AgentSession {
    if (this.config.reuseAgent) {
      const running = AgentSession.fromEnvironment(this.env);
      if (running && this.listAgentKeys(running) !== null) {
        this.logger.info(`Using the running ssh-agent at ${running.socket}.`);
        return running;
      }
    }

    const result = this.runUtility('load-agent', 'agent', ['-s']);
    const session = AgentSession.fromAgentOutput(result.stdout);
    if (!session) {
      throw new ProvisionError(
        'MalformedUtilityOutput',
        'ssh-agent did not report an SSH_AUTH_SOCK',
        {
          step: 'load-agent',
          utility: UTILITY_NAMES.agent,
          stderr: result.stderr.trim() || undefined,
        }
      );
    }

    this.logger.info(
      `SSH agent started (pid ${session.pid ?? 'unknown'}, socket ${session.socket}).`
    );
    return session;
  }

  /**
   * @returns The `ssh-add -l` listing, or null when the agent cannot be reached.
   * Exit status 1 means a reachable agent holding no keys.
   */
  private listAgentKeys(session: AgentSession): string | null {
    const result = this.runner.run(this.config.utilities.add, ['-l'], {
      env: session.toEnv(this.env),
      timeoutMs: this.config.commandTimeoutMs,
    });

    if (result.error || (result.exitCode !== 0 && result.exitCode !== 1)) {
      return null;
    }
    return result.stdout;
  }

  private fingerprintOrNull(): KeyFingerprint | null {
    const result = this.runner.run(
      this.config.utilities.keygen,
      ['-l', '-f', this.keyPath],
      { env: this.env, timeoutMs: this.config.commandTimeoutMs }
    );

    if (result.error || result.exitCode !== 0) {
      return null;
    }
    return parseFingerprint(result.stdout);
  }

  private runUtility(
    step: ProvisionStep,
    utility: keyof UtilityPaths,
    args: string[],
    remediation?: string,
    env: NodeJS.ProcessEnv = this.env
  ): CommandResult {
    const name = UTILITY_NAMES[utility];
    const command = this.config.utilities[utility];
    this.logger.debug(`$ ${describeCommand(command, args)}`);

    const result = this.runner.run(command, args, {
      env,
      timeoutMs: this.config.commandTimeoutMs,
    });

    if (result.error) {
      const missing = isNotFound(result.error);
      throw new ProvisionError(
        'UtilityInvocationError',
        `Error running ${name}: ${result.error.message}`,
        {
          step,
          utility: name,
          stderr: result.stderr.trim() || undefined,
          remediation: missing
            ? `Install the OpenSSH client tools so that ${command} is on PATH.`
            : remediation,
          cause: result.error,
        }
      );
    }

    if (result.exitCode !== 0) {
      const status =
        result.exitCode === null
          ? `was killed by ${result.signal ?? 'a signal'}`
          : `exited with status ${result.exitCode}`;
      throw new ProvisionError('UtilityInvocationError', `${name} ${status}`, {
        step,
        utility: name,
        stderr: result.stderr.trim() || undefined,
        remediation,
      });
    }

    return result;
  }

  private readOrCreate(filePath: string, step: ProvisionStep): string {
    try {
      fs.closeSync(fs.openSync(filePath, 'a', 0o600));
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new ProvisionError(
        'FilesystemError',
        `Cannot open ${filePath}: ${describeError(error)}`,
        { step, cause: error }
      );
    }
  }

  private appendOrThrow(filePath: string, text: string, step: ProvisionStep): void {
    try {
      fs.appendFileSync(filePath, text);
    } catch (error) {
      throw new ProvisionError(
        'FilesystemError',
        `Cannot write ${filePath}: ${describeError(error)}`,
        { step, cause: error }
      );
    }
  }

  private readIfExists(filePath: string): string {
    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      if (isMissingPath(error)) {
        return '';
      }
      throw error;
    }
  }

  private statOrNull(filePath: string): fs.Stats | null {
    try {
      return fs.statSync(filePath);
    } catch (error) {
      if (isMissingPath(error)) {
        return null;
      }
      throw error;
    }
  }
}
