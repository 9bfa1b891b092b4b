import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandResult, ProvisionerConfig, ProvisionResult } from '../src/interfaces';

export type SuccessfulResult = Extract<ProvisionResult, { success: true }>;
export type FailedResult = Extract<ProvisionResult, { success: false }>;

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'skp-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function makeConfig(
  sshDir: string,
  overrides: Partial<ProvisionerConfig> = {}
): ProvisionerConfig {
  return {
    secretName: 'id_rsa_github',
    host: 'github.com',
    port: 22,
    user: 'git',
    sshDir,
    keyFileName: 'id_rsa_github',
    hashKnownHosts: true,
    reuseAgent: true,
    commandTimeoutMs: 0,
    verbose: false,
    utilities: {
      keyscan: 'ssh-keyscan',
      keygen: 'ssh-keygen',
      agent: 'ssh-agent',
      add: 'ssh-add',
    },
    ...overrides,
  };
}

export function commandResult(
  command: string,
  args: string[],
  stdout: string,
  exitCode: number | null = 0,
  stderr = ''
): CommandResult {
  return {
    command,
    args,
    exitCode,
    signal: null,
    stdout,
    stderr,
    duration: 1,
  };
}

export function launchFailure(command: string, args: string[]): CommandResult {
  return {
    ...commandResult(command, args, '', null),
    error: Object.assign(new Error(`spawnSync ${command} ENOENT`), {
      code: 'ENOENT',
    }),
  };
}

export function assertSuccess(
  result: ProvisionResult
): asserts result is SuccessfulResult {
  if (!result.success) {
    throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
  }
}

export function assertFailure(
  result: ProvisionResult
): asserts result is FailedResult {
  if (result.success) {
    throw new Error('expected provisioning to fail');
  }
}
