export interface SshConfigBlock {
  keyword: 'host' | 'match';
  /**
   * @description Host patterns for Host blocks; the raw criteria for Match blocks.
   */
  patterns: string[];
  directives: Array<{ name: string; value: string }>;
  line: number;
}

export interface StanzaOptions {
  host: string;
  port: number;
  identityFile: string;
  user: string;
}

function splitDirective(line: string): { name: string; value: string } | null {
  const match = /^([A-Za-z][A-Za-z0-9]*)(?:\s*=\s*|\s+)(.*)$/.exec(line);
  if (!match) {
    return null;
  }
  return { name: match[1].toLowerCase(), value: match[2].trim() };
}

function splitPatterns(value: string): string[] {
  const patterns: string[] = [];
  const tokenPattern = /"([^"]*)"|(\S+)/g;
  let token: RegExpExecArray | null;

  while ((token = tokenPattern.exec(value)) !== null) {
    const pattern = token[1] ?? token[2];
    patterns.push(...pattern.split(',').filter((p) => p.length > 0));
  }

  return patterns;
}

function quoteIfNeeded(value: string): string {
  return /\s/.test(value) ? `"${value}"` : value;
}

/**
 * Parsed view of an OpenSSH client config file
 */
export class SshConfigFile {
  /**
   * @description Directives before the first Host or Match line.
   */
  readonly globals: Array<{ name: string; value: string }>;
  readonly blocks: SshConfigBlock[];

  constructor(
    globals: Array<{ name: string; value: string }>,
    blocks: SshConfigBlock[]
  ) {
    this.globals = globals;
    this.blocks = blocks;
  }

  static parse(text: string): SshConfigFile {
    const globals: Array<{ name: string; value: string }> = [];
    const blocks: SshConfigBlock[] = [];
    let current: SshConfigBlock | null = null;

    text.split(/\r?\n/).forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (line.length === 0 || line.startsWith('#')) {
        return;
      }

      const directive = splitDirective(line);
      if (!directive) {
        return;
      }

      if (directive.name === 'host' || directive.name === 'match') {
        current = {
          keyword: directive.name,
          patterns:
            directive.name === 'host'
              ? splitPatterns(directive.value)
              : [directive.value],
          directives: [],
          line: index + 1,
        };
        blocks.push(current);
        return;
      }

      if (current) {
        current.directives.push(directive);
      } else {
        globals.push(directive);
      }
    });

    return new SshConfigFile(globals, blocks);
  }

  /**
   * @description Host blocks listing this exact host; wildcard and negated patterns do not count.
   */
  blocksFor(host: string): SshConfigBlock[] {
    const name = host.toLowerCase();
    return this.blocks.filter(
      (block) =>
        block.keyword === 'host' &&
        block.patterns.some((pattern) => pattern.toLowerCase() === name)
    );
  }

  hasHost(host: string): boolean {
    return this.blocksFor(host).length > 0;
  }

  /**
   * @description Renders the stanza binding the host to the provisioned key.
   */
  static renderStanza(options: StanzaOptions): string {
    const lines = [`Host ${options.host}`, `    HostName ${options.host}`];
    if (options.port !== 22) {
      lines.push(`    Port ${options.port}`);
    }
    lines.push(`    IdentityFile ${quoteIfNeeded(options.identityFile)}`);
    lines.push(`    User ${options.user}`);
    return `${lines.join('\n')}\n`;
  }

  /**
   * @description The text to append so the stanza starts on its own line after a blank one.
   */
  static separatorFor(existing: string): string {
    if (existing.length === 0) {
      return '';
    }
    if (existing.endsWith('\n\n')) {
      return '';
    }
    return existing.endsWith('\n') ? '\n' : '\n\n';
  }
}
