export const AUTH_SOCK_VAR = 'SSH_AUTH_SOCK';
export const AGENT_PID_VAR = 'SSH_AGENT_PID';

/**
 * @description Reads `NAME=value;` assignments from `ssh-agent -s` output.
 * Each line is cut at its first `;` and then at its first `=`; lines that
 * do not fit that shape (such as `echo Agent pid 1234;`) are ignored.
 */
export function parseAgentOutput(stdout: string): Record<string, string> {
  const variables: Record<string, string> = {};

  for (const line of stdout.split(/\r?\n/)) {
    if (!line.includes('=') || !line.includes(';')) {
      continue;
    }

    const assignment = line.split(';')[0];
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      continue;
    }

    const name = assignment.slice(0, separator).trim();
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      continue;
    }

    variables[name] = assignment.slice(separator + 1);
  }

  return variables;
}

/**
 * The agent that holds the provisioned key. Passed to whatever runs SSH
 * next instead of being written into process.env.
 */
export class AgentSession {
  readonly socket: string;
  readonly pid?: number;
  /**
   * @description True when an already running agent was reused.
   */
  readonly reused: boolean;
  private readonly variables: Record<string, string>;

  private constructor(
    variables: Record<string, string>,
    socket: string,
    reused: boolean
  ) {
    this.variables = variables;
    this.socket = socket;
    this.reused = reused;

    const pid = variables[AGENT_PID_VAR];
    this.pid = pid && /^\d+$/.test(pid) ? parseInt(pid, 10) : undefined;
  }

  /**
   * @returns The session, or null when the output names no socket.
   */
  static fromAgentOutput(stdout: string): AgentSession | null {
    const variables = parseAgentOutput(stdout);
    const socket = variables[AUTH_SOCK_VAR];
    if (!socket) {
      return null;
    }
    return new AgentSession(variables, socket, false);
  }

  /**
   * @returns The session an environment already points at, or null.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv): AgentSession | null {
    const socket = env[AUTH_SOCK_VAR];
    if (!socket) {
      return null;
    }

    const variables: Record<string, string> = { [AUTH_SOCK_VAR]: socket };
    const pid = env[AGENT_PID_VAR];
    if (pid) {
      variables[AGENT_PID_VAR] = pid;
    }
    return new AgentSession(variables, socket, true);
  }

  get environment(): Record<string, string> {
    return { ...this.variables };
  }

  /**
   * @description The base environment with the agent variables laid over it.
   */
  toEnv(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    return { ...base, ...this.variables };
  }

  /**
   * @description Bourne shell statements for `eval "$(skp provision --print-env)"`.
   */
  toShellExports(): string {
    return Object.entries(this.variables)
      .map(([name, value]) => `${name}=${shellQuote(value)}; export ${name};`)
      .join('\n');
  }
}

function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:@%+=-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
