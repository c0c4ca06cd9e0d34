import { expect } from 'chai';
import { promises as fs } from 'fs';
import path from 'path';
import {
  EnvironmentCredentialProvider,
  envPrefixFor,
  resolveChannelCredentials
} from '../../../src/credentials/CredentialProvider.js';
import { ConfigurationError, CredentialNotFoundError } from '../../../src/errors/syncErrors.js';
import { makeProfile, makeTempDir, rejectionOf, removeDir } from '../../helpers/fakes.js';

describe('EnvironmentCredentialProvider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('derives the variable prefix from the site id', () => {
    expect(envPrefixFor('blog-prod')).to.equal('SITE_SYNC_BLOG_PROD');
    expect(envPrefixFor('shop.v2')).to.equal('SITE_SYNC_SHOP_V2');
  });

  it('reads passwords', async () => {
    const provider = new EnvironmentCredentialProvider({ SITE_SYNC_BLOG_PASSWORD: 'test-secret' });

    expect(await provider.resolve('blog', 'transportPassword')).to.equal('test-secret');
    expect(await provider.resolve('shop', 'transportPassword')).to.be.undefined;
  });

  it('treats an empty variable as unset', async () => {
    const provider = new EnvironmentCredentialProvider({ SITE_SYNC_BLOG_PASSWORD: '' });
    expect(await provider.resolve('blog', 'transportPassword')).to.be.undefined;
  });

  it('prefers inline key material over a key file', async () => {
    const provider = new EnvironmentCredentialProvider({
      SITE_SYNC_BLOG_KEY: 'inline-key',
      SITE_SYNC_BLOG_KEY_FILE: path.join(dir, 'missing')
    });

    expect(await provider.resolve('blog', 'transportKeyMaterial')).to.equal('inline-key');
  });

  it('reads key material from a file', async () => {
    const keyFile = path.join(dir, 'id_test');
    await fs.writeFile(keyFile, 'file-key');
    const provider = new EnvironmentCredentialProvider({ SITE_SYNC_BLOG_KEY_FILE: keyFile });

    expect(await provider.resolve('blog', 'transportKeyMaterial')).to.equal('file-key');
  });

  it('reports an unreadable key file as a configuration problem', async () => {
    const provider = new EnvironmentCredentialProvider({ SITE_SYNC_BLOG_KEY_FILE: path.join(dir, 'missing') });

    const error = await rejectionOf(provider.resolve('blog', 'transportKeyMaterial'));

    expect(error).to.be.instanceOf(ConfigurationError);
    expect(error).to.have.property('field', 'SITE_SYNC_BLOG_KEY_FILE');
  });
});

describe('resolveChannelCredentials', () => {
  it('resolves what the auth method needs', async () => {
    const provider = new EnvironmentCredentialProvider({
      SITE_SYNC_BLOG_PASSWORD: 'test-secret',
      SITE_SYNC_BLOG_KEY: 'test-key'
    });
    const passwordProfile = makeProfile('/tmp/site');
    const keyProfile = makeProfile('/tmp/site', {
      connection: { ...passwordProfile.connection, auth: 'key' }
    });

    expect(await resolveChannelCredentials(passwordProfile, provider)).to.deep.equal({ password: 'test-secret' });
    expect(await resolveChannelCredentials(keyProfile, provider)).to.deep.equal({ privateKey: 'test-key' });
  });

  it('names the missing variable without any secret', async () => {
    const error = await rejectionOf(resolveChannelCredentials(makeProfile('/tmp/site'), new EnvironmentCredentialProvider({})));

    expect(error).to.be.instanceOf(CredentialNotFoundError);
    expect(error).to.have.property('message', 'No password found for site "blog" (set SITE_SYNC_BLOG_PASSWORD)');
    expect(error).to.have.property('code', 'CREDENTIAL_NOT_FOUND');
  });
});
