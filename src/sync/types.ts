/**
 * Shared types for site synchronization.
 *
 * Plans, outcomes and records are immutable values: built once, frozen,
 * and replaced rather than edited.
 */

export type SyncDirection = 'push' | 'pull';

export type AuthMethod = 'password' | 'key';

export interface ConnectionParameters {
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly auth: AuthMethod;
  /** Milliseconds to wait for the SSH handshake */
  readonly readyTimeoutMs?: number;
}

/**
 * One synchronized pair of trees. Credentials are resolved separately.
 */
export interface SiteProfile {
  readonly id: string;
  readonly name?: string;
  readonly localRoot: string;
  readonly remoteRoot: string;
  readonly connection: ConnectionParameters;
  readonly exclusions: ExclusionRuleSet;
  /** Remote-relative roots a pull may scan */
  readonly pullScopes: readonly string[];
  /** Remove remote copies of files deleted in git since the last push */
  readonly mirrorDeletions?: boolean;
}

export type ExclusionRuleSet = readonly string[];

export type PlannedAction = 'upload' | 'download' | 'delete';

export interface PlannedItem {
  /** Path relative to both roots, '/'-separated */
  readonly relativePath: string;
  readonly action: PlannedAction;
  readonly size?: number;
  /** Remote modification time (ms since epoch), pull items only */
  readonly modifiedAt?: number;
}

export interface TransferPlan {
  readonly direction: SyncDirection;
  readonly items: readonly PlannedItem[];
  /** Non-fatal findings made while planning, e.g. a missing pull scope */
  readonly advisories: readonly string[];
}

export type FailureKind = 'io' | 'permission' | 'not_found' | 'connection';

export interface TransferFailure {
  readonly path: string;
  readonly kind: FailureKind;
  readonly message: string;
}

export interface OperationOutcome {
  /** True only when nothing failed and the run was not cancelled */
  readonly succeeded: boolean;
  readonly cancelled: boolean;
  readonly itemsAttempted: number;
  readonly itemsTransferred: number;
  readonly itemsFailed: number;
  readonly bytesTransferred: number;
  readonly failures: readonly TransferFailure[];
  /** Item-level warnings that did not fail the item (e.g. chmod refused) */
  readonly notes: readonly string[];
  /** Planned paths never attempted because of cancellation */
  readonly unattemptedPaths: readonly string[];
  readonly startedAt: string;
  readonly finishedAt: string;
}

export type RecordStatus = 'success' | 'partial' | 'failed' | 'cancelled';

export interface PushRecord {
  readonly revisionId: string;
  readonly revisionSummary?: string;
  readonly timestamp: string;
  readonly status: RecordStatus;
  readonly itemsTransferred: number;
  readonly itemsFailed: number;
  readonly bytesTransferred: number;
  /** Uploads that failed or were skipped; the next push retries them */
  readonly pendingPaths: readonly string[];
  /** Mirror deletions that failed or were skipped; retried while the path stays untracked */
  readonly pendingDeletes: readonly string[];
}

export interface PullRecord {
  readonly windowStart: string;
  readonly windowEnd: string;
  readonly timestamp: string;
  readonly status: RecordStatus;
  readonly itemsTransferred: number;
  readonly itemsFailed: number;
  readonly bytesTransferred: number;
}

/**
 * Progress sink. Called once per processed item with a monotonic count.
 * A returned promise is not awaited.
 */
export type ProgressSink = (current: number, total: number, message: string) => void | Promise<void>;

export function freezePlan(plan: TransferPlan): TransferPlan {
  return Object.freeze({
    direction: plan.direction,
    items: Object.freeze(plan.items.map(item => Object.freeze({ ...item }))),
    advisories: Object.freeze([...plan.advisories])
  });
}

export function recordStatusOf(outcome: OperationOutcome): RecordStatus {
  if (outcome.cancelled) {
    return 'cancelled';
  }
  if (outcome.itemsFailed === 0) {
    return 'success';
  }
  return outcome.itemsTransferred > 0 ? 'partial' : 'failed';
}
