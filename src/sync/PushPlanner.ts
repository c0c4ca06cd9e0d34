/**
 * PushPlanner - decides which local files a push uploads
 *
 * Steps:
 * - Observe the current revision (this is the revision a push records)
 * - First push: every tracked file. Otherwise: files added/modified since the
 *   last pushed revision, plus paths the last push left pending
 * - Drop excluded paths
 * - Optionally emit deletes for files removed from version control
 *
 * Read-only: touches neither the remote nor sync state.
 */

import { mcpLogger } from '../utils/mcpLogger.js';
import { ExclusionMatcher } from '../utils/exclusionMatcher.js';
import { RevisionDiffSource } from './RevisionDiffSource.js';
import { compareRelativePaths } from './RemoteDirectoryLister.js';
import { PlannedItem, PushRecord, SiteProfile, TransferPlan, freezePlan } from './types.js';
import { PlanningError, RevisionSourceError, errorMessageOf } from '../errors/syncErrors.js';

export interface PushPlanResult {
  plan: TransferPlan;
  /** Revision observed before computing the delta */
  currentRevision: string;
  /** Revision the delta was computed from; undefined on a first push */
  baseRevision?: string;
  revisionSummary?: string;
}

export class PushPlanner {
  constructor(private readonly source: RevisionDiffSource) {}

  /**
   * @throws RevisionSourceError when the repository or a revision is missing
   * @throws PlanningError for anything else
   */
  async plan(profile: SiteProfile, lastPush?: PushRecord): Promise<PushPlanResult> {
    const baseRevision = lastPush?.revisionId ? lastPush.revisionId : undefined;
    mcpLogger.info('sync', `[PUSH PLANNER] ${profile.id}: planning from ${baseRevision ?? '(first push)'}`);

    try {
      const advisories: string[] = [];

      // Step 1: pin the revision before anything else
      const currentRevision = await this.source.currentRevision();

      // Step 2: candidate files
      const candidates = new Set<string>();
      const deleted = new Set<string>();

      if (!baseRevision) {
        for (const file of await this.source.allTrackedFiles(currentRevision)) {
          candidates.add(file);
        }
      } else {
        for (const file of await this.source.changedFiles(baseRevision, currentRevision)) {
          candidates.add(file);
        }

        // Left over from the previous push: uploads while still tracked,
        // deletions while still untracked
        const pending = lastPush?.pendingPaths ?? [];
        const pendingDeletes = profile.mirrorDeletions ? lastPush?.pendingDeletes ?? [] : [];
        if (pending.length > 0 || pendingDeletes.length > 0) {
          const tracked = new Set(await this.source.allTrackedFiles(currentRevision));
          const carried = pending.filter(file => tracked.has(file));
          const carriedDeletes = pendingDeletes.filter(file => !tracked.has(file));
          carried.forEach(file => candidates.add(file));
          carriedDeletes.forEach(file => deleted.add(file));
          const total = carried.length + carriedDeletes.length;
          if (total > 0) {
            advisories.push(`${total} file(s) left over from the previous push were re-planned`);
          }
        }

        if (profile.mirrorDeletions) {
          for (const file of await this.source.deletedFiles(baseRevision, currentRevision)) {
            deleted.add(file);
          }
        }
      }

      // Step 3: exclusions
      const matcher = await ExclusionMatcher.forSite(profile.localRoot, profile.exclusions);
      const uploads = matcher.filterPaths(candidates).sort(compareRelativePaths);
      const deletes = matcher.filterPaths(Array.from(deleted).filter(file => !candidates.has(file))).sort(compareRelativePaths);

      const items: PlannedItem[] = [
        ...uploads.map((relativePath): PlannedItem => ({ relativePath, action: 'upload' })),
        ...deletes.map((relativePath): PlannedItem => ({ relativePath, action: 'delete' }))
      ];

      const excludedCount = candidates.size - uploads.length;
      if (excludedCount > 0) {
        mcpLogger.debug('sync', `[PUSH PLANNER] ${profile.id}: ${excludedCount} path(s) excluded`);
      }

      const revisionSummary = await this.source.revisionSummary(currentRevision);

      mcpLogger.info('sync',
        `[PUSH PLANNER] ${profile.id}: ${uploads.length} upload(s), ${deletes.length} delete(s) at ${currentRevision}`);

      return {
        plan: freezePlan({ direction: 'push', items, advisories }),
        currentRevision,
        baseRevision,
        revisionSummary
      };
    } catch (error) {
      if (error instanceof RevisionSourceError || error instanceof PlanningError) {
        throw error;
      }
      throw new PlanningError(`Push planning failed for site "${profile.id}": ${errorMessageOf(error)}`, error);
    }
  }
}

/**
 * Functional form used by the orchestrator and preview alike
 */
export function planPush(
  profile: SiteProfile,
  lastPush: PushRecord | undefined,
  source: RevisionDiffSource
): Promise<PushPlanResult> {
  return new PushPlanner(source).plan(profile, lastPush);
}
