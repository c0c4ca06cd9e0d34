/**
 * SyncStateStore - durable per-site record of the last push and pull
 *
 * Stored at `<stateDir>/sync-state.json`:
 * {
 *   "version": 1,
 *   "sites": {
 *     "blog": {
 *       "lastPush": { "revisionId": "…", "timestamp": "…", "status": "success", … },
 *       "lastPull": { "windowStart": "…", "windowEnd": "…", … }
 *     }
 *   }
 * }
 *
 * Other tooling reads this file, so the layout is a contract. Updates are
 * read-modify-write, serialized within the process and written atomically.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { mcpLogger } from '../utils/mcpLogger.js';
import { OperationOutcome, PullRecord, PushRecord, RecordStatus, recordStatusOf } from './types.js';
import { StateStoreError, errorCodeOf, errorMessageOf } from '../errors/syncErrors.js';

export const STATE_FILE_NAME = 'sync-state.json';
const STATE_VERSION = 1;

export interface SiteState {
  readonly lastPush?: PushRecord;
  readonly lastPull?: PullRecord;
}

interface StateFile {
  version: typeof STATE_VERSION;
  sites: Record<string, SiteState>;
}

// ============================================================================
// Parsing
// ============================================================================

const STATUSES: readonly RecordStatus[] = ['success', 'partial', 'failed', 'cancelled'];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, where: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new Error(`${where}.${key} must be a string`);
  }
  return value;
}

function readCount(source: Record<string, unknown>, key: string, where: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`${where}.${key} must be a non-negative number`);
  }
  return value;
}

function readStatus(source: Record<string, unknown>, where: string): RecordStatus {
  const value = source.status;
  const status = STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new Error(`${where}.status must be one of ${STATUSES.join(', ')}`);
  }
  return status;
}

function readPathList(source: Record<string, unknown>, key: string, where: string): string[] {
  const value = source[key] ?? [];
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    throw new Error(`${where}.${key} must be a list of strings`);
  }
  return value;
}

function parsePushRecord(value: unknown, where: string): PushRecord {
  if (!isObject(value)) {
    throw new Error(`${where} must be an object`);
  }
  const summary = value.revisionSummary;
  return {
    revisionId: readString(value, 'revisionId', where),
    revisionSummary: typeof summary === 'string' ? summary : undefined,
    timestamp: readString(value, 'timestamp', where),
    status: readStatus(value, where),
    itemsTransferred: readCount(value, 'itemsTransferred', where),
    itemsFailed: readCount(value, 'itemsFailed', where),
    bytesTransferred: readCount(value, 'bytesTransferred', where),
    pendingPaths: readPathList(value, 'pendingPaths', where),
    pendingDeletes: readPathList(value, 'pendingDeletes', where)
  };
}

function parsePullRecord(value: unknown, where: string): PullRecord {
  if (!isObject(value)) {
    throw new Error(`${where} must be an object`);
  }
  return {
    windowStart: readString(value, 'windowStart', where),
    windowEnd: readString(value, 'windowEnd', where),
    timestamp: readString(value, 'timestamp', where),
    status: readStatus(value, where),
    itemsTransferred: readCount(value, 'itemsTransferred', where),
    itemsFailed: readCount(value, 'itemsFailed', where),
    bytesTransferred: readCount(value, 'bytesTransferred', where)
  };
}

function parseStateFile(content: string): StateFile {
  const raw: unknown = JSON.parse(content);
  if (!isObject(raw) || !isObject(raw.sites)) {
    throw new Error('expected an object with a "sites" map');
  }
  if (raw.version !== STATE_VERSION) {
    throw new Error(`unsupported version ${String(raw.version)}`);
  }

  const sites: Record<string, SiteState> = {};
  for (const [siteId, entry] of Object.entries(raw.sites)) {
    if (!isObject(entry)) {
      throw new Error(`sites.${siteId} must be an object`);
    }
    sites[siteId] = {
      lastPush: entry.lastPush === undefined ? undefined : parsePushRecord(entry.lastPush, `sites.${siteId}.lastPush`),
      lastPull: entry.lastPull === undefined ? undefined : parsePullRecord(entry.lastPull, `sites.${siteId}.lastPull`)
    };
  }
  return { version: STATE_VERSION, sites };
}

// ============================================================================
// Store
// ============================================================================

export class SyncStateStore {
  private readonly statePath: string;
  private updateChain: Promise<void> = Promise.resolve();

  constructor(stateDir: string) {
    this.statePath = path.join(stateDir, STATE_FILE_NAME);
  }

  getPath(): string {
    return this.statePath;
  }

  async getSiteState(siteId: string): Promise<SiteState> {
    const state = await this.load();
    return state.sites[siteId] ?? {};
  }

  async getPushState(siteId: string): Promise<PushRecord | undefined> {
    return (await this.getSiteState(siteId)).lastPush;
  }

  async getPullState(siteId: string): Promise<PullRecord | undefined> {
    return (await this.getSiteState(siteId)).lastPull;
  }

  recordPush(siteId: string, record: PushRecord): Promise<void> {
    return this.update(siteId, current => ({ ...current, lastPush: Object.freeze({ ...record }) }));
  }

  recordPull(siteId: string, record: PullRecord): Promise<void> {
    return this.update(siteId, current => ({ ...current, lastPull: Object.freeze({ ...record }) }));
  }

  /**
   * @throws StateStoreError if the file is unreadable or malformed
   */
  private async load(): Promise<StateFile> {
    let content: string;
    try {
      content = await fs.readFile(this.statePath, 'utf-8');
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        return { version: STATE_VERSION, sites: {} };
      }
      throw new StateStoreError(`Cannot read sync state: ${errorMessageOf(error)}`, this.statePath, error);
    }

    try {
      return parseStateFile(content);
    } catch (error) {
      throw new StateStoreError(`Sync state file is malformed: ${errorMessageOf(error)}`, this.statePath, error);
    }
  }

  private update(siteId: string, mutate: (current: SiteState) => SiteState): Promise<void> {
    const run = this.updateChain.then(async () => {
      const state = await this.load();
      state.sites[siteId] = mutate(state.sites[siteId] ?? {});
      await this.save(state);
    });
    // the caller sees failures through `run`; the chain only orders writes
    this.updateChain = run.then(() => undefined, () => undefined);
    return run;
  }

  private async save(state: StateFile): Promise<void> {
    const tempPath = `${this.statePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.statePath), { recursive: true, mode: 0o700 });
      await fs.writeFile(tempPath, JSON.stringify(state, null, 2) + '\n', { mode: 0o600 });
      await fs.rename(tempPath, this.statePath);
      mcpLogger.debug('sync', `[STATE] Saved ${this.statePath}`);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        mcpLogger.debug('sync', `[STATE] Could not remove ${tempPath}: ${errorMessageOf(cleanupError)}`);
      });
      throw new StateStoreError(`Cannot write sync state: ${errorMessageOf(error)}`, this.statePath, error);
    }
  }

  // ==========================================================================
  // Record factories
  // ==========================================================================

  static createPushRecord(
    revisionId: string,
    outcome: OperationOutcome,
    pendingPaths: readonly string[],
    revisionSummary?: string,
    pendingDeletes: readonly string[] = []
  ): PushRecord {
    return Object.freeze({
      revisionId,
      revisionSummary,
      timestamp: outcome.finishedAt,
      status: recordStatusOf(outcome),
      itemsTransferred: outcome.itemsTransferred,
      itemsFailed: outcome.itemsFailed,
      bytesTransferred: outcome.bytesTransferred,
      pendingPaths: Object.freeze([...pendingPaths]),
      pendingDeletes: Object.freeze([...pendingDeletes])
    });
  }

  static createPullRecord(windowStart: Date, windowEnd: Date, outcome: OperationOutcome): PullRecord {
    return Object.freeze({
      windowStart: windowStart.toISOString(),
      windowEnd: windowEnd.toISOString(),
      timestamp: outcome.finishedAt,
      status: recordStatusOf(outcome),
      itemsTransferred: outcome.itemsTransferred,
      itemsFailed: outcome.itemsFailed,
      bytesTransferred: outcome.bytesTransferred
    });
  }
}
