/**
 * PullOrchestrator - connect, plan from the remote listing, download, record
 *
 * Pull planning needs the remote listing, so the channel opens before the
 * planner runs. preview() opens a channel for listing only and never starts
 * the executor; it calls the same planPull as execute().
 *
 * The pull record is informational. Nothing here reads it back.
 */

import { mcpLogger } from '../utils/mcpLogger.js';
import { RemoteDirectoryLister } from './RemoteDirectoryLister.js';
import { planPull, validatePullWindow } from './PullPlanner.js';
import { SyncStateStore } from './SyncStateStore.js';
import { AbortedSync, SyncResult, abortedResult } from './SyncResult.js';
import { OperationOutcome, SiteProfile, TransferPlan } from './types.js';
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

export interface PullRequest {
  readonly windowStart: Date;
  readonly windowEnd: Date;
  /** Overrides the profile's pullScopes when non-empty */
  readonly scopePaths?: readonly string[];
}

export interface PullPreview {
  readonly status: 'planned';
  readonly direction: 'pull';
  readonly siteId: string;
  readonly plan: TransferPlan;
}

export class PullOrchestrator {
  constructor(private readonly deps: SyncDependencies) {}

  async preview(profile: SiteProfile, request: PullRequest): Promise<PullPreview | AbortedSync> {
    let site: SiteProfile;
    let channel: TransferChannel;
    try {
      site = validatedProfile(profile);
      validatePullWindow(request.windowStart, request.windowEnd);
      channel = await openChannel(site, this.deps);
    } catch (error) {
      return abortedResult('pull', profile.id, error);
    }

    try {
      const plan = await this.plan(site, request, channel);
      return { status: 'planned', direction: 'pull', siteId: profile.id, plan };
    } catch (error) {
      return abortedResult('pull', profile.id, error);
    } finally {
      await closeChannel(channel, profile.id);
    }
  }

  async execute(profile: SiteProfile, request: PullRequest, options: RunOptions = {}): Promise<SyncResult> {
    let site: SiteProfile;
    try {
      site = validatedProfile(profile);
      validatePullWindow(request.windowStart, request.windowEnd);
      await this.deps.locks.acquireLock(profile.id, 'pull');
    } catch (error) {
      return abortedResult('pull', profile.id, error);
    }

    try {
      return await this.run(site, request, options);
    } catch (error) {
      return abortedResult('pull', profile.id, error);
    } finally {
      await this.deps.locks.releaseLock(profile.id);
    }
  }

  private plan(profile: SiteProfile, request: PullRequest, channel: TransferChannel): Promise<TransferPlan> {
    return planPull(
      profile,
      request.scopePaths,
      request.windowStart,
      request.windowEnd,
      new RemoteDirectoryLister(channel)
    );
  }

  private async run(profile: SiteProfile, request: PullRequest, options: RunOptions): Promise<SyncResult> {
    let channel: TransferChannel;
    try {
      channel = await openChannel(profile, this.deps);
    } catch (error) {
      return abortedResult('pull', profile.id, error);
    }

    let plan: TransferPlan;
    let outcome: OperationOutcome;
    try {
      try {
        plan = await this.plan(profile, request, channel);
      } catch (error) {
        return abortedResult('pull', profile.id, error);
      }

      if (plan.items.length === 0) {
        mcpLogger.info('sync', `[PULL] ${profile.id}: nothing modified in window`);
        return { status: 'completed', direction: 'pull', siteId: profile.id, plan, outcome: emptyOutcome() };
      }

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
      const record = SyncStateStore.createPullRecord(request.windowStart, request.windowEnd, outcome);
      stateWarning = await recordOutcome(profile.id, () => this.deps.stateStore.recordPull(profile.id, record));
    }

    mcpLogger.info('sync',
      `[PULL] ${profile.id}: ${outcome.itemsTransferred}/${plan.items.length} downloaded, ${outcome.itemsFailed} failed` +
      (outcome.cancelled ? ' (cancelled)' : ''));

    return { status: 'completed', direction: 'pull', siteId: profile.id, plan, outcome, stateWarning };
  }
}
