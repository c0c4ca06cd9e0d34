/**
 * Check that a site's transport works: credentials resolve, the channel
 * opens and the remote root is there. Transfers nothing.
 */

import { SiteProfile } from './types.js';
import { SyncFailure, toSyncFailure } from './SyncResult.js';
import { SyncDependencies, closeChannel, openChannel } from './operationSupport.js';
import { SiteSyncError } from '../errors/syncErrors.js';

export type ConnectionTestResult =
  | { readonly ok: true; readonly siteId: string; readonly remoteRootExists: boolean; readonly elapsedMs: number }
  | { readonly ok: false; readonly siteId: string; readonly error: SyncFailure };

export async function testConnection(
  profile: SiteProfile,
  deps: Pick<SyncDependencies, 'credentials' | 'connector'>
): Promise<ConnectionTestResult> {
  const started = Date.now();
  try {
    const channel = await openChannel(profile, deps);
    try {
      const remoteRootExists = await channel.exists(profile.remoteRoot);
      return { ok: true, siteId: profile.id, remoteRootExists, elapsedMs: Date.now() - started };
    } finally {
      await closeChannel(channel, profile.id);
    }
  } catch (error) {
    const failure = toSyncFailure(error);
    // anything past the handshake is still a transport problem here
    return {
      ok: false,
      siteId: profile.id,
      error: error instanceof SiteSyncError ? failure : { ...failure, kind: 'connection', code: 'CONNECTION_ERROR' }
    };
  }
}
