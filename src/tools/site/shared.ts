/**
 * Response shapes and helpers shared by the site tools
 */

import { SiteSyncConfig } from '../../config/siteSyncConfig.js';
import { SiteSyncError } from '../../errors/syncErrors.js';
import { PushDependencies } from '../../sync/PushOrchestrator.js';
import { CompletedSync, SyncFailure, SyncSummary, summarizeResult, toSyncFailure } from '../../sync/SyncResult.js';
import { PlannedAction, PlannedItem, ProgressSink, TransferFailure } from '../../sync/types.js';
import { log } from '../../utils/logger.js';
import { ToolContext } from '../base.js';

/**
 * What the tools are constructed with: loaded config plus engine collaborators
 */
export interface SiteSyncServices extends PushDependencies {
  config: SiteSyncConfig;
}

/** Longest item or failure list echoed back in a response */
export const MAX_LISTED_ITEMS = 200;

export interface ToolErrorResponse {
  success: false;
  operation: string;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface ItemView {
  path: string;
  action: PlannedAction;
  size?: number;
  modifiedAt?: string;
}

export interface PlanView {
  counts: Record<PlannedAction, number>;
  total: number;
  items: ItemView[];
  /** More items were planned than are listed */
  truncated: boolean;
  advisories: string[];
}

export interface OutcomeView {
  result: SyncSummary;
  attempted: number;
  transferred: number;
  failed: number;
  bytesTransferred: number;
  failures: TransferFailure[];
  notes: string[];
  unattempted: number;
  startedAt: string;
  finishedAt: string;
  stateWarning?: string;
}

export function errorResponse(
  operation: string,
  code: string,
  message: string,
  details?: Record<string, unknown>
): ToolErrorResponse {
  log.error(`[SITE] ${operation} error: ${code} - ${message}`);

  return {
    success: false,
    operation,
    error: {
      code,
      message,
      ...(details && { details })
    }
  };
}

/**
 * Render an abort from the orchestrators
 */
export function failureResponse(operation: string, failure: SyncFailure): ToolErrorResponse {
  return errorResponse(operation, failure.code, failure.message, { kind: failure.kind, ...failure.details });
}

export function handleError(operation: string, error: unknown): ToolErrorResponse {
  if (error instanceof SiteSyncError) {
    return failureResponse(operation, toSyncFailure(error));
  }

  const message = error instanceof Error ? error.message : String(error);
  log.error(`[SITE] Unexpected error in ${operation}:`, error);

  return errorResponse(operation, 'INTERNAL_ERROR', message);
}

function itemView(item: PlannedItem): ItemView {
  return {
    path: item.relativePath,
    action: item.action,
    ...(item.size !== undefined && { size: item.size }),
    ...(item.modifiedAt !== undefined && { modifiedAt: new Date(item.modifiedAt).toISOString() })
  };
}

export function planView(items: readonly PlannedItem[], advisories: readonly string[]): PlanView {
  const counts: Record<PlannedAction, number> = { upload: 0, download: 0, delete: 0 };
  for (const item of items) {
    counts[item.action]++;
  }
  return {
    counts,
    total: items.length,
    items: items.slice(0, MAX_LISTED_ITEMS).map(itemView),
    truncated: items.length > MAX_LISTED_ITEMS,
    advisories: [...advisories]
  };
}

export function outcomeView(result: CompletedSync): OutcomeView {
  const { outcome } = result;
  return {
    result: summarizeResult(result),
    attempted: outcome.itemsAttempted,
    transferred: outcome.itemsTransferred,
    failed: outcome.itemsFailed,
    bytesTransferred: outcome.bytesTransferred,
    failures: outcome.failures.slice(0, MAX_LISTED_ITEMS),
    notes: [...outcome.notes],
    unattempted: outcome.unattemptedPaths.length,
    startedAt: outcome.startedAt,
    finishedAt: outcome.finishedAt,
    ...(result.stateWarning !== undefined && { stateWarning: result.stateWarning })
  };
}

/**
 * Bridge executor progress to MCP progress notifications, when requested
 */
export function progressSinkOf(context: ToolContext): ProgressSink | undefined {
  const send = context.sendProgress;
  if (!send) {
    return undefined;
  }
  return (current, total, message) => send(current, total, message);
}

export const SYNC_MODES = ['preview', 'execute'] as const;
