import type { AgentSession } from '../classes/agent-session';
import type { ProvisionError } from '../lib/errors';

export type ProvisionStep =
  | 'fetch-secret'
  | 'ensure-directory'
  | 'write-key'
  | 'trust-host'
  | 'configure-client'
  | 'verify-key'
  | 'load-agent';

export type StepStatus = 'done' | 'skipped' | 'failed';

export interface StepReport {
  step: ProvisionStep;
  status: StepStatus;
  detail?: string;
}

export interface UtilityPaths {
  keyscan: string;
  keygen: string;
  agent: string;
  add: string;
}

export interface ProvisionerConfig {
  /**
   * @description The name of the secret holding the private key.
   */
  secretName: string;
  /**
   * @description The code host to trust and configure, e.g. github.com.
   */
  host: string;
  port: number;
  /**
   * @description The login user written to the client config stanza.
   */
  user: string;
  /**
   * @description The owner-only directory holding the key, known_hosts and config.
   */
  sshDir: string;
  /**
   * @description The file name of the private key inside sshDir.
   */
  keyFileName: string;
  /**
   * @description Directory of file-per-secret mounts; the environment is used when unset.
   */
  secretsDir?: string;
  /**
   * @description Ask ssh-keyscan for hashed host names (-H).
   */
  hashKnownHosts: boolean;
  /**
   * @description Reuse a reachable agent named by SSH_AUTH_SOCK instead of starting one.
   */
  reuseAgent: boolean;
  /**
   * @description Per-invocation deadline for external utilities; 0 disables it.
   */
  commandTimeoutMs: number;
  verbose: boolean;
  utilities: UtilityPaths;
}

export interface KeyFingerprint {
  bits?: number;
  hash?: string;
  comment?: string;
  type?: string;
  raw: string;
}

export type ProvisionResult =
  | {
      success: true;
      keyPath: string;
      fingerprint: KeyFingerprint;
      session: AgentSession;
      steps: StepReport[];
    }
  | {
      success: false;
      error: ProvisionError;
      steps: StepReport[];
    };

export interface StatusCheck {
  name: string;
  ok: boolean;
  detail: string;
}
