/**
 * Pieces shared by the push and pull orchestrators
 */

import { ChannelConnector, ChannelEndpoint, TransferChannel } from './TransferChannel.js';
import { OperationOutcome, ProgressSink, SiteProfile } from './types.js';
import { SyncStateStore } from './SyncStateStore.js';
import { TransferExecutor } from './TransferExecutor.js';
import { CredentialProvider, resolveChannelCredentials } from '../credentials/CredentialProvider.js';
import { SiteLockManager } from '../utils/lockManager.js';
import { errorMessageOf } from '../errors/syncErrors.js';
import { log } from '../utils/logger.js';
import { SiteValidator } from '../utils/validation.js';

/**
 * Everything an operation needs, injected per orchestrator
 */
export interface SyncDependencies {
  stateStore: SyncStateStore;
  credentials: CredentialProvider;
  connector: ChannelConnector;
  locks: SiteLockManager;
  executor?: TransferExecutor;
}

export interface RunOptions {
  onProgress?: ProgressSink;
  /** Checked between items */
  signal?: AbortSignal;
}

/**
 * Re-check a profile handed in by the caller, not only at config load
 *
 * @throws ConfigurationError
 */
export function validatedProfile(profile: SiteProfile): SiteProfile {
  return SiteValidator.validateSiteProfile(profile).profile;
}

export function endpointOf(profile: SiteProfile): ChannelEndpoint {
  return {
    host: profile.connection.host,
    port: profile.connection.port,
    username: profile.connection.username,
    readyTimeoutMs: profile.connection.readyTimeoutMs
  };
}

/**
 * Resolve credentials and connect
 *
 * @throws CredentialNotFoundError, ConnectionError
 */
export async function openChannel(
  profile: SiteProfile,
  deps: Pick<SyncDependencies, 'credentials' | 'connector'>
): Promise<TransferChannel> {
  const credentials = await resolveChannelCredentials(profile, deps.credentials);
  return deps.connector.connect(endpointOf(profile), credentials);
}

/**
 * Close a channel; a failing close is logged since the work is already done
 */
export async function closeChannel(channel: TransferChannel, siteId: string): Promise<void> {
  try {
    await channel.close();
  } catch (error) {
    log.warn(`[SYNC] ${siteId}: channel close failed: ${errorMessageOf(error)}`);
  }
}

/**
 * Persist a record; failure becomes a warning string on the result
 */
export async function recordOutcome(siteId: string, write: () => Promise<void>): Promise<string | undefined> {
  try {
    await write();
    return undefined;
  } catch (error) {
    const warning = `Transfer finished but sync state was not saved: ${errorMessageOf(error)}`;
    log.warn(`[SYNC] ${siteId}: ${warning}`);
    return warning;
  }
}

/**
 * Outcome for an operation with nothing to transfer
 */
export function emptyOutcome(): OperationOutcome {
  const now = new Date().toISOString();
  return Object.freeze({
    succeeded: true,
    cancelled: false,
    itemsAttempted: 0,
    itemsTransferred: 0,
    itemsFailed: 0,
    bytesTransferred: 0,
    failures: Object.freeze([]),
    notes: Object.freeze([]),
    unattemptedPaths: Object.freeze([]),
    startedAt: now,
    finishedAt: now
  });
}

export function executorOf(deps: SyncDependencies): TransferExecutor {
  return deps.executor ?? new TransferExecutor();
}
