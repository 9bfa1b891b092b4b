import { createHmac, timingSafeEqual } from 'crypto';

export type KnownHostMarker = '@cert-authority' | '@revoked';

export interface KnownHostEntry {
  marker?: KnownHostMarker;
  /**
   * @description Host patterns as written: plain names, [host]:port, or a single |1|salt|hash.
   */
  hostNames: string[];
  keyType: string;
  /**
   * @description Base64 public key blob.
   */
  key: string;
  comment?: string;
  line: number;
}

const HASH_MAGIC = '|1|';

/**
 * @description The host name as known_hosts records it: bare for port 22, [host]:port otherwise.
 */
export function formatHostName(host: string, port = 22): string {
  const lower = host.toLowerCase();
  return port === 22 ? lower : `[${lower}]:${port}`;
}

/**
 * @description HMAC-SHA1 of the host name keyed by the salt, base64 encoded (the -H format).
 */
export function hashHostName(name: string, salt: Buffer): string {
  return createHmac('sha1', salt).update(name).digest('base64');
}

function matchesHashed(pattern: string, name: string): boolean {
  const parts = pattern.slice(HASH_MAGIC.length).split('|');
  if (parts.length !== 2) {
    return false;
  }

  const salt = Buffer.from(parts[0], 'base64');
  const expected = Buffer.from(parts[1], 'base64');
  const actual = Buffer.from(hashHostName(name, salt), 'base64');

  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

/**
 * Parsed view of an OpenSSH known_hosts file
 */
export class KnownHostsFile {
  readonly entries: KnownHostEntry[];

  constructor(entries: KnownHostEntry[]) {
    this.entries = entries;
  }

  /**
   * @description Parses known_hosts text. Comments, blank lines and lines
   * without a host, key type and key are skipped.
   */
  static parse(text: string): KnownHostsFile {
    const entries: KnownHostEntry[] = [];

    text.split(/\r?\n/).forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (line.length === 0 || line.startsWith('#')) {
        return;
      }

      const fields = line.split(/\s+/);
      const first = fields[0];
      let marker: KnownHostMarker | undefined;
      if (first === '@cert-authority' || first === '@revoked') {
        marker = first;
        fields.shift();
      } else if (first.startsWith('@')) {
        return;
      }

      if (fields.length < 3) {
        return;
      }

      const [hosts, keyType, key, ...rest] = fields;
      entries.push({
        marker,
        hostNames: hosts.split(',').filter((name) => name.length > 0),
        keyType,
        key,
        comment: rest.length > 0 ? rest.join(' ') : undefined,
        line: index + 1,
      });
    });

    return new KnownHostsFile(entries);
  }

  /**
   * @description Unmarked entries naming exactly this host (wildcards are not expanded).
   */
  entriesFor(host: string, port = 22): KnownHostEntry[] {
    const name = formatHostName(host, port);

    return this.entries.filter((entry) => {
      if (entry.marker) {
        return false;
      }
      return entry.hostNames.some((pattern) => {
        if (pattern.startsWith(HASH_MAGIC)) {
          return matchesHashed(pattern, name);
        }
        return pattern.toLowerCase() === name;
      });
    });
  }

  hasHost(host: string, port = 22): boolean {
    return this.entriesFor(host, port).length > 0;
  }

  /**
   * @description Trusted key blobs for the host, minus any the file revokes.
   */
  keysFor(host: string, port = 22): string[] {
    const revoked = new Set(
      this.entries
        .filter((entry) => entry.marker === '@revoked')
        .map((entry) => entry.key)
    );

    return this.entriesFor(host, port)
      .map((entry) => entry.key)
      .filter((key) => !revoked.has(key));
  }
}
