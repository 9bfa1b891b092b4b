import { spawnSync } from 'child_process';
import shellEscape from 'shell-escape';
import { CommandOptions, CommandResult, CommandRunner } from '../interfaces';

/**
 * @description Renders a command line for logs, quoted the way a shell would need it.
 */
export function describeCommand(command: string, args: string[]): string {
  return shellEscape([command, ...args]);
}

/**
 * Runs external utilities synchronously. Every call blocks until the child
 * exits or its deadline passes; launch failures come back in the result.
 */
export class SpawnCommandRunner implements CommandRunner {
  run(
    command: string,
    args: string[],
    options: CommandOptions = {}
  ): CommandResult {
    const startTime = Date.now();

    const child = spawnSync(command, args, {
      env: options.env ?? process.env,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout:
        options.timeoutMs && options.timeoutMs > 0
          ? options.timeoutMs
          : undefined,
      windowsHide: true,
    });

    return {
      command,
      args,
      exitCode: child.status,
      signal: child.signal,
      stdout: child.stdout ?? '',
      stderr: child.stderr ?? '',
      error: child.error,
      duration: Date.now() - startTime,
    };
  }
}
