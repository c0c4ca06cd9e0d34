/**
 * PullPlanner - decides which remote files a pull downloads
 *
 * Each pull is scoped by the caller's time window and scope paths only.
 * Previous pulls are never consulted.
 */

import path from 'path';
import { mcpLogger } from '../utils/mcpLogger.js';
import { ExclusionMatcher } from '../utils/exclusionMatcher.js';
import { RemoteDirectoryLister, RemoteFileEntry, compareRelativePaths } from './RemoteDirectoryLister.js';
import { PlannedItem, SiteProfile, TransferPlan, freezePlan } from './types.js';
import { ConfigurationError, PlanningError, errorMessageOf } from '../errors/syncErrors.js';

export interface PullWindow {
  readonly start: Date;
  readonly end: Date;
}

/**
 * @throws ConfigurationError when the window is invalid or reversed
 */
export function validatePullWindow(start: Date, end: Date): PullWindow {
  if (Number.isNaN(start.getTime())) {
    throw new ConfigurationError('Pull window start is not a valid date', 'windowStart');
  }
  if (Number.isNaN(end.getTime())) {
    throw new ConfigurationError('Pull window end is not a valid date', 'windowEnd');
  }
  if (start.getTime() > end.getTime()) {
    throw new ConfigurationError(
      `Pull window start ${start.toISOString()} is after end ${end.toISOString()}`,
      'windowStart'
    );
  }
  return { start, end };
}

/**
 * Trim, drop blanks, strip surrounding slashes. '.' and '/' mean the remote root.
 */
export function normalizeScopePaths(scopes: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of scopes) {
    if (raw.trim().length === 0) {
      continue;
    }
    let scope = raw.trim().replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
    if (scope === '.') {
      scope = '';
    }
    seen.add(scope);
  }
  return Array.from(seen);
}

export class PullPlanner {
  constructor(private readonly lister: RemoteDirectoryLister) {}

  /**
   * @param scopePaths - remote-relative roots; empty or undefined uses the profile's
   * @throws ConfigurationError for a bad window
   * @throws PlanningError when listing fails for a reason other than an unreadable directory
   */
  async plan(
    profile: SiteProfile,
    scopePaths: readonly string[] | undefined,
    windowStart: Date,
    windowEnd: Date
  ): Promise<TransferPlan> {
    const window = validatePullWindow(windowStart, windowEnd);
    const startMs = window.start.getTime();
    const endMs = window.end.getTime();

    const requested = scopePaths && scopePaths.length > 0 ? scopePaths : profile.pullScopes;
    const scopes = normalizeScopePaths(requested);
    const advisories: string[] = [];

    mcpLogger.info('sync',
      `[PULL PLANNER] ${profile.id}: ${scopes.length} scope(s), window ${window.start.toISOString()} .. ${window.end.toISOString()}`);

    if (scopes.length === 0) {
      advisories.push('No scope paths given or configured; nothing to scan');
      return freezePlan({ direction: 'pull', items: [], advisories });
    }

    try {
      const matcher = await ExclusionMatcher.forSite(profile.localRoot, profile.exclusions);
      const selected = new Map<string, RemoteFileEntry>();

      for (const scope of scopes) {
        if (scope.split('/').includes('..')) {
          advisories.push(`Scope "${scope}" points outside the remote root; skipped`);
          continue;
        }

        const remoteScope = scope ? path.posix.join(profile.remoteRoot, scope) : profile.remoteRoot;
        if (!(await this.lister.exists(remoteScope))) {
          advisories.push(`Remote scope "${scope || '/'}" does not exist; skipped`);
          mcpLogger.warning('sync', `[PULL PLANNER] ${profile.id}: ${remoteScope} not found`);
          continue;
        }

        const listed = await this.lister.listRecursive(profile.remoteRoot, scope, unreadable => {
          advisories.push(
            `Remote directory "${unreadable.relativePath || '/'}" could not be listed (${unreadable.message}); skipped`
          );
        });

        for (const entry of listed) {
          if (entry.modifiedAt < startMs || entry.modifiedAt > endMs) {
            continue;
          }
          if (matcher.isExcluded(entry.relativePath)) {
            continue;
          }
          selected.set(entry.relativePath, entry);
        }
      }

      const items = Array.from(selected.values())
        .sort((a, b) => compareRelativePaths(a.relativePath, b.relativePath))
        .map((entry): PlannedItem => ({
          relativePath: entry.relativePath,
          action: 'download',
          size: entry.size,
          modifiedAt: entry.modifiedAt
        }));

      mcpLogger.info('sync', `[PULL PLANNER] ${profile.id}: ${items.length} file(s) in window`);

      return freezePlan({ direction: 'pull', items, advisories });
    } catch (error) {
      throw new PlanningError(`Pull planning failed for site "${profile.id}": ${errorMessageOf(error)}`, error);
    }
  }
}

export function planPull(
  profile: SiteProfile,
  scopePaths: readonly string[] | undefined,
  windowStart: Date,
  windowEnd: Date,
  lister: RemoteDirectoryLister
): Promise<TransferPlan> {
  return new PullPlanner(lister).plan(profile, scopePaths, windowStart, windowEnd);
}
