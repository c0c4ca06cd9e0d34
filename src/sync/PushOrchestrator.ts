/**
 * PushOrchestrator - plan, connect, upload, record
 *
 * Flow for execute():
 * 1. Validate the profile, then take the site lock
 * 2. Read the last push record and plan from it
 * 3. Empty plan: no connection; record the new revision if it moved
 * 4. Connect (failure aborts with state untouched)
 * 5. Execute, then close the channel on every path
 * 6. If anything was attempted, record the planned revision, counts and
 *    the uploads and deletions still pending
 *
 * preview() runs step 2 only, through the same planPush call.
 */

import { mcpLogger } from '../utils/mcpLogger.js';
import { PushPlanResult, planPush } from './PushPlanner.js';
import { RevisionSourceFactory } from './RevisionDiffSource.js';
import { SyncStateStore } from './SyncStateStore.js';
import { AbortedSync, SyncResult, abortedResult } from './SyncResult.js';
import { OperationOutcome, SiteProfile } from './types.js';
import { TransferChannel } from './TransferChannel.js';
import {
  RunOptions,
  SyncDependencies,
  closeChannel,
  emptyOutcome,
  executorOf,
  openChannel,
  recordOutcome,
  validatedProfile
} from './operationSupport.js';

export interface PushDependencies extends SyncDependencies {
  revisionSource: RevisionSourceFactory;
}

export interface PushPreview extends PushPlanResult {
  readonly status: 'planned';
  readonly direction: 'push';
  readonly siteId: string;
}

export class PushOrchestrator {
  constructor(private readonly deps: PushDependencies) {}

  async preview(profile: SiteProfile): Promise<PushPreview | AbortedSync> {
    try {
      const { planned } = await this.plan(validatedProfile(profile));
      return { status: 'planned', direction: 'push', siteId: profile.id, ...planned };
    } catch (error) {
      return abortedResult('push', profile.id, error);
    }
  }

  async execute(profile: SiteProfile, options: RunOptions = {}): Promise<SyncResult> {
    let site: SiteProfile;
    try {
      site = validatedProfile(profile);
      await this.deps.locks.acquireLock(profile.id, 'push');
    } catch (error) {
      return abortedResult('push', profile.id, error);
    }

    try {
      return await this.run(site, options);
    } catch (error) {
      return abortedResult('push', profile.id, error);
    } finally {
      await this.deps.locks.releaseLock(profile.id);
    }
  }

  private async plan(profile: SiteProfile): Promise<{ planned: PushPlanResult; lastRevision?: string }> {
    const lastPush = await this.deps.stateStore.getPushState(profile.id);
    const planned = await planPush(profile, lastPush, this.deps.revisionSource(profile));
    return { planned, lastRevision: lastPush?.revisionId };
  }

  private async run(profile: SiteProfile, options: RunOptions): Promise<SyncResult> {
    const { stateStore } = this.deps;
    const { planned, lastRevision } = await this.plan(profile);
    const { plan, currentRevision, revisionSummary } = planned;

    if (plan.items.length === 0) {
      const outcome = emptyOutcome();
      let stateWarning: string | undefined;

      // Revision moved without touching an eligible file: still advance the base
      if (currentRevision !== lastRevision) {
        stateWarning = await recordOutcome(profile.id, () =>
          stateStore.recordPush(profile.id, SyncStateStore.createPushRecord(currentRevision, outcome, [], revisionSummary)));
      }

      mcpLogger.info('sync', `[PUSH] ${profile.id}: nothing to push at ${currentRevision}`);
      return { status: 'completed', direction: 'push', siteId: profile.id, plan, outcome, revision: currentRevision, stateWarning };
    }

    let channel: TransferChannel;
    try {
      channel = await openChannel(profile, this.deps);
    } catch (error) {
      return abortedResult('push', profile.id, error);
    }

    let outcome: OperationOutcome;
    try {
      outcome = await executorOf(this.deps).execute(plan, channel, {
        localRoot: profile.localRoot,
        remoteRoot: profile.remoteRoot,
        onProgress: options.onProgress,
        signal: options.signal
      });
    } finally {
      await closeChannel(channel, profile.id);
    }

    let stateWarning: string | undefined;
    if (outcome.itemsAttempted > 0) {
      const deletes = new Set(plan.items.filter(item => item.action === 'delete').map(item => item.relativePath));
      const leftOver = [...outcome.failures.map(failure => failure.path), ...outcome.unattemptedPaths];
      const pendingPaths = leftOver.filter(file => !deletes.has(file));
      const pendingDeletes = leftOver.filter(file => deletes.has(file));
      stateWarning = await recordOutcome(profile.id, () =>
        stateStore.recordPush(profile.id,
          SyncStateStore.createPushRecord(currentRevision, outcome, pendingPaths, revisionSummary, pendingDeletes)));
    }

    mcpLogger.info('sync',
      `[PUSH] ${profile.id}: ${outcome.itemsTransferred}/${plan.items.length} transferred, ${outcome.itemsFailed} failed` +
      (outcome.cancelled ? ' (cancelled)' : ''));

    return { status: 'completed', direction: 'push', siteId: profile.id, plan, outcome, revision: currentRevision, stateWarning };
  }
}
