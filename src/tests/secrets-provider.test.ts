import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  createSecretsProvider,
  EnvSecretsProvider,
  FileSecretsProvider,
} from '../classes/secrets-provider';

describe('EnvSecretsProvider', () => {
  it('should read the exact name, then the upper-cased one', () => {
    const provider = new EnvSecretsProvider({
      id_rsa_github: 'exact',
      DEPLOY_KEY: 'upper',
    });

    expect(provider.get('id_rsa_github')).to.equal('exact');
    expect(provider.get('deploy_key')).to.equal('upper');
    expect(provider.get('missing')).to.be.undefined;
  });
});

describe('FileSecretsProvider', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skp-secrets-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read one file per secret', () => {
    fs.writeFileSync(path.join(dir, 'id_rsa_github'), 'key-body\n');

    const provider = new FileSecretsProvider(dir);

    expect(provider.get('id_rsa_github')).to.equal('key-body\n');
    expect(provider.description).to.equal(`directory ${dir}`);
  });

  it('should report a missing file as not found', () => {
    expect(new FileSecretsProvider(dir).get('absent')).to.be.undefined;
  });

  it('should throw when the secret path cannot be read', () => {
    fs.mkdirSync(path.join(dir, 'a_directory'));

    expect(() => new FileSecretsProvider(dir).get('a_directory')).to.throw(
      /Cannot read secret file/
    );
  });

  it('should refuse names that leave the directory', () => {
    expect(() => new FileSecretsProvider(dir).get('../passwd')).to.throw(
      'Secret name can only contain'
    );
  });
});

describe('createSecretsProvider', () => {
  it('should pick the file provider when a secrets directory is set', () => {
    expect(createSecretsProvider({ secretsDir: '/run/secrets' })).to.be.instanceOf(
      FileSecretsProvider
    );
    expect(createSecretsProvider({}, {})).to.be.instanceOf(EnvSecretsProvider);
  });
});
