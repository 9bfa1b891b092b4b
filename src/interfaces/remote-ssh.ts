export interface SSHConnectionConfig {
  host: string;
  port?: number; // default 22
  username: string;

  // the provisioned key, the agent socket, or both
  privateKeyPath?: string;
  agentSocket?: string;
  readyTimeout?: number;

  /**
   * @description Base64 host key blobs accepted during the handshake, as recorded in known_hosts.
   */
  trustedHostKeys: string[];
}

export interface CommandOptions {
  /**
   * @description The full environment of the child process.
   */
  env?: NodeJS.ProcessEnv;
  /**
   * @description Deadline in milliseconds; unset or 0 waits forever.
   */
  timeoutMs?: number;
}

export interface CommandResult {
  command: string;
  args: string[];
  /**
   * @description Null when the process could not be launched or was killed.
   */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /**
   * @description Set when the process failed to launch or hit its deadline.
   */
  error?: Error;
  duration: number;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): CommandResult;
}
