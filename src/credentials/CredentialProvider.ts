/**
 * Credential lookup for transport connections.
 *
 * Secrets are returned to the caller and used for one connection attempt.
 * Nothing here logs a secret value or writes one to disk.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CredentialKind, CredentialNotFoundError, ConfigurationError, errorMessageOf } from '../errors/syncErrors.js';
import { ChannelCredentials } from '../sync/TransferChannel.js';
import { SiteProfile } from '../sync/types.js';

export type { CredentialKind } from '../errors/syncErrors.js';

export interface CredentialProvider {
  /** The secret, or undefined when none is stored */
  resolve(siteId: string, kind: CredentialKind): Promise<string | undefined>;
}

/**
 * Environment variable prefix for a site: `blog-prod` → `SITE_SYNC_BLOG_PROD`
 */
export function envPrefixFor(siteId: string): string {
  return `SITE_SYNC_${siteId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

/**
 * Reads secrets from the environment:
 * - `SITE_SYNC_<ID>_PASSWORD`
 * - `SITE_SYNC_<ID>_KEY` (PEM text) or `SITE_SYNC_<ID>_KEY_FILE` (path, `~` expanded)
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(siteId: string, kind: CredentialKind): Promise<string | undefined> {
    const prefix = envPrefixFor(siteId);

    if (kind === 'transportPassword') {
      return this.nonEmpty(this.env[`${prefix}_PASSWORD`]);
    }

    const inline = this.nonEmpty(this.env[`${prefix}_KEY`]);
    if (inline) {
      return inline;
    }

    const keyFile = this.nonEmpty(this.env[`${prefix}_KEY_FILE`]);
    if (!keyFile) {
      return undefined;
    }

    const resolved = keyFile.startsWith('~') ? path.join(os.homedir(), keyFile.slice(1)) : keyFile;
    try {
      return await fs.readFile(resolved, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(
        `Key file for site "${siteId}" cannot be read (${resolved}): ${errorMessageOf(error)}`,
        `${prefix}_KEY_FILE`
      );
    }
  }

  private nonEmpty(value: string | undefined): string | undefined {
    return value && value.length > 0 ? value : undefined;
  }
}

/**
 * Resolve what a profile's auth method needs
 *
 * @throws CredentialNotFoundError
 */
export async function resolveChannelCredentials(
  profile: SiteProfile,
  provider: CredentialProvider
): Promise<ChannelCredentials> {
  if (profile.connection.auth === 'key') {
    const privateKey = await provider.resolve(profile.id, 'transportKeyMaterial');
    if (!privateKey) {
      throw new CredentialNotFoundError(profile.id, 'transportKeyMaterial',
        `set ${envPrefixFor(profile.id)}_KEY or ${envPrefixFor(profile.id)}_KEY_FILE`);
    }
    return { privateKey };
  }

  const password = await provider.resolve(profile.id, 'transportPassword');
  if (!password) {
    throw new CredentialNotFoundError(profile.id, 'transportPassword', `set ${envPrefixFor(profile.id)}_PASSWORD`);
  }
  return { password };
}
