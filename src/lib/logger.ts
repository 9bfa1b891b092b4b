import chalk from 'chalk';

export interface LoggerOptions {
  /**
   * @description Print debug lines.
   */
  verbose?: boolean;
  /**
   * @description Swallow all output (used by tests).
   */
  silent?: boolean;
  /**
   * @description Send every line to stderr, keeping stdout for machine-readable output.
   */
  stderr?: boolean;
}

/**
 * Console logger for the provisioning trail
 */
export class Logger {
  private verbose: boolean;
  private silent: boolean;
  private write: (message: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.write = options.stderr
      ? (message) => console.error(message)
      : (message) => console.log(message);
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  info(message: string): void {
    if (this.silent) return;
    this.write(message);
  }

  success(message: string): void {
    if (this.silent) return;
    this.write(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    if (this.silent) return;
    console.warn(chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    if (this.silent) return;
    console.error(chalk.red(`✗ ${message}`));
  }

  debug(message: string): void {
    if (this.silent || !this.verbose) return;
    this.write(chalk.dim(message));
  }
}

export const logger = new Logger();
