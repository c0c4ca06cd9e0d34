/**
 * Whole-operation results returned by the orchestrators.
 *
 * An operation either completed (possibly with per-item failures, possibly
 * cancelled) or was aborted before anything was transferred. Expected
 * failures are values of this type, never exceptions.
 */

import { OperationOutcome, SyncDirection, TransferPlan } from './types.js';
import {
  ConfigurationError,
  ConnectionError,
  CredentialNotFoundError,
  LockTimeoutError,
  PlanningError,
  RevisionSourceError,
  SiteSyncError,
  StateStoreError,
  errorMessageOf
} from '../errors/syncErrors.js';

export type AbortKind = 'configuration' | 'connection' | 'planning' | 'busy';

export interface SyncFailure {
  readonly kind: AbortKind;
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface CompletedSync {
  readonly status: 'completed';
  readonly direction: SyncDirection;
  readonly siteId: string;
  readonly plan: TransferPlan;
  readonly outcome: OperationOutcome;
  /** Revision recorded by a push */
  readonly revision?: string;
  /** Set when the outcome could not be persisted */
  readonly stateWarning?: string;
}

export interface AbortedSync {
  readonly status: 'aborted';
  readonly direction: SyncDirection;
  readonly siteId: string;
  readonly error: SyncFailure;
}

export type SyncResult = CompletedSync | AbortedSync;

export type SyncSummary = 'nothing_to_do' | 'success' | 'partial' | 'failed' | 'cancelled' | 'aborted';

/**
 * Collapse a result into the cases a caller renders differently
 */
export function summarizeResult(result: SyncResult): SyncSummary {
  if (result.status === 'aborted') {
    return 'aborted';
  }
  const { outcome, plan } = result;
  if (outcome.cancelled) {
    return 'cancelled';
  }
  if (plan.items.length === 0) {
    return 'nothing_to_do';
  }
  if (outcome.itemsFailed === 0) {
    return 'success';
  }
  return outcome.itemsTransferred > 0 ? 'partial' : 'failed';
}

/**
 * Classify an error that stopped an operation before transfer
 */
export function toSyncFailure(error: unknown): SyncFailure {
  const details = error instanceof SiteSyncError ? error.data : undefined;

  if (error instanceof ConfigurationError || error instanceof CredentialNotFoundError) {
    return { kind: 'configuration', code: error.code, message: error.message, details };
  }
  if (error instanceof RevisionSourceError) {
    return {
      kind: error.isConfigurationFault ? 'configuration' : 'planning',
      code: error.code,
      message: error.message,
      details
    };
  }
  if (error instanceof ConnectionError) {
    return { kind: 'connection', code: error.code, message: error.message, details };
  }
  if (error instanceof LockTimeoutError) {
    return { kind: 'busy', code: error.code, message: error.message, details };
  }
  if (error instanceof PlanningError || error instanceof StateStoreError) {
    return { kind: 'planning', code: error.code, message: error.message, details };
  }
  return {
    kind: 'planning',
    code: 'PLANNING_ERROR',
    message: `Unexpected failure before transfer: ${errorMessageOf(error)}`
  };
}

export function abortedResult(direction: SyncDirection, siteId: string, error: unknown): AbortedSync {
  return Object.freeze({ status: 'aborted', direction, siteId, error: Object.freeze(toSyncFailure(error)) });
}
