import { NodeSSH } from 'node-ssh';
import { SSHConnectionConfig } from '../interfaces';

/**
 * Opens an SSH session to the code host to prove the provisioned key and
 * host trust work. Code hosts refuse shell commands, so a completed
 * handshake and authentication is the whole test.
 */
export class ConnectionTester {
  private ssh: NodeSSH;
  private config: SSHConnectionConfig;
  private trustedHostKeys: Set<string>;
  private presentedHostKey?: string;

  constructor(config: SSHConnectionConfig) {
    this.ssh = new NodeSSH();
    this.config = config;
    this.trustedHostKeys = new Set(config.trustedHostKeys);
  }

  /**
   * @description Host key check for the handshake: the raw key blob must be one known_hosts records.
   */
  verifyHostKey(key: Buffer): boolean {
    this.presentedHostKey = key.toString('base64');
    return this.trustedHostKeys.has(this.presentedHostKey);
  }

  /**
   * Connect to the code host, accepting only host keys from known_hosts
   */
  async connect(): Promise<void> {
    try {
      await this.ssh.connect({
        host: this.config.host,
        port: this.config.port ?? 22,
        username: this.config.username,
        privateKeyPath: this.config.privateKeyPath,
        agent: this.config.agentSocket,
        readyTimeout: this.config.readyTimeout,
        hostVerifier: (key: Buffer): boolean => this.verifyHostKey(key),
      });
    } catch (error) {
      if (
        this.presentedHostKey &&
        !this.trustedHostKeys.has(this.presentedHostKey)
      ) {
        throw new Error(
          `Host key presented by ${this.config.host} is not in known_hosts`
        );
      }
      throw new Error(`Failed to connect to ${this.config.host}: ${error}`);
    }
  }

  /**
   * Disconnect from the code host
   */
  async disconnect(): Promise<void> {
    try {
      this.ssh.dispose();
    } catch (error) {
      throw new Error(`Failed to disconnect from ${this.config.host}: ${error}`);
    }
  }

  isConnected(): boolean {
    return this.ssh.isConnected();
  }
}
