/**
 * TransferExecutor - walks a plan against a TransferChannel
 *
 * Items run one at a time, in plan order. A failing item is recorded and the
 * walk continues. Cancellation is honoured between items only, so no file is
 * ever left half-written by a cancel.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../utils/logger.js';
import { TransferChannel } from './TransferChannel.js';
import {
  FailureKind,
  OperationOutcome,
  PlannedItem,
  ProgressSink,
  TransferFailure,
  TransferPlan
} from './types.js';
import { errorCodeOf, errorMessageOf } from '../errors/syncErrors.js';

export interface ExecuteOptions {
  localRoot: string;
  remoteRoot: string;
  onProgress?: ProgressSink;
  /** Checked before each item */
  signal?: AbortSignal;
}

const NOT_FOUND_CODES: ReadonlySet<string | number> = new Set(['ENOENT', 'ENOTDIR', 2]);
const PERMISSION_CODES: ReadonlySet<string | number> = new Set(['EACCES', 'EPERM', 'EROFS', 3]);
const CONNECTION_CODES: ReadonlySet<string | number> = new Set([
  'ECONNRESET', 'ECONNREFUSED', 'ECONNABORTED', 'EPIPE', 'ETIMEDOUT', 'ERR_NOT_CONNECTED'
]);

/**
 * Map a node / SFTP error to a failure kind. SFTP status 2 is
 * NO_SUCH_FILE and 3 is PERMISSION_DENIED.
 */
export function classifyTransferError(error: unknown): FailureKind {
  const code = errorCodeOf(error);
  if (code !== undefined) {
    if (NOT_FOUND_CODES.has(code)) return 'not_found';
    if (PERMISSION_CODES.has(code)) return 'permission';
    if (CONNECTION_CODES.has(code)) return 'connection';
  }

  const message = errorMessageOf(error);
  if (/no such file/i.test(message)) return 'not_found';
  if (/permission denied/i.test(message)) return 'permission';
  if (/not connected|no sftp connection|connection (lost|closed|reset)/i.test(message)) return 'connection';
  return 'io';
}

interface ItemResult {
  bytes: number;
  note?: string;
}

export class TransferExecutor {
  /**
   * Execute a plan. Never throws for per-item failures; they are in the outcome.
   */
  async execute(plan: TransferPlan, channel: TransferChannel, options: ExecuteOptions): Promise<OperationOutcome> {
    const { onProgress, signal } = options;
    const total = plan.items.length;
    const startedAt = new Date().toISOString();

    log.info(`[EXECUTOR] Executing ${plan.direction} plan: ${total} item(s)`);

    const failures: TransferFailure[] = [];
    const notes: string[] = [];
    let transferred = 0;
    let bytes = 0;
    let processed = 0;
    let cancelled = false;

    for (const item of plan.items) {
      if (signal?.aborted) {
        cancelled = true;
        log.warn(`[EXECUTOR] Cancelled after ${processed} of ${total} item(s)`);
        break;
      }

      try {
        const result = await this.executeItem(item, channel, options);
        transferred++;
        bytes += result.bytes;
        if (result.note) {
          notes.push(result.note);
        }
      } catch (error) {
        const failure: TransferFailure = {
          path: item.relativePath,
          kind: classifyTransferError(error),
          message: errorMessageOf(error)
        };
        failures.push(failure);
        log.warn(`[EXECUTOR] ${item.action} failed for ${item.relativePath} (${failure.kind}): ${failure.message}`);
      }

      processed++;
      this.notifyProgress(onProgress, processed, total, item.relativePath);
    }

    const unattemptedPaths = plan.items.slice(processed).map(item => item.relativePath);

    log.info(`[EXECUTOR] Done: ${transferred} ok, ${failures.length} failed, ${bytes} bytes` +
      (cancelled ? `, ${unattemptedPaths.length} not attempted` : ''));

    return Object.freeze({
      succeeded: failures.length === 0 && !cancelled,
      cancelled,
      itemsAttempted: processed,
      itemsTransferred: transferred,
      itemsFailed: failures.length,
      bytesTransferred: bytes,
      failures: Object.freeze(failures.map(failure => Object.freeze(failure))),
      notes: Object.freeze(notes),
      unattemptedPaths: Object.freeze(unattemptedPaths),
      startedAt,
      finishedAt: new Date().toISOString()
    });
  }

  private async executeItem(item: PlannedItem, channel: TransferChannel, options: ExecuteOptions): Promise<ItemResult> {
    const localPath = path.join(options.localRoot, ...item.relativePath.split('/'));
    const remotePath = path.posix.join(options.remoteRoot, item.relativePath);

    switch (item.action) {
      case 'upload':
        return this.upload(item, localPath, remotePath, channel);
      case 'download':
        await fs.mkdir(path.dirname(localPath), { recursive: true });
        return { bytes: await channel.get(remotePath, localPath) };
      case 'delete':
        await channel.remove(remotePath);
        return { bytes: 0 };
    }
  }

  private async upload(item: PlannedItem, localPath: string, remotePath: string, channel: TransferChannel): Promise<ItemResult> {
    const stat = await fs.stat(localPath);
    if (!stat.isFile()) {
      throw new Error(`${item.relativePath} is not a regular file`);
    }

    await channel.mkdirRecursive(path.posix.dirname(remotePath));
    const bytes = await channel.put(localPath, remotePath);

    const mode = stat.mode & 0o7777;
    try {
      await channel.chmod(remotePath, mode);
    } catch (error) {
      const note = `${item.relativePath}: permissions ${mode.toString(8)} not applied (${errorMessageOf(error)})`;
      log.warn(`[EXECUTOR] ${note}`);
      return { bytes, note };
    }
    return { bytes };
  }

  private notifyProgress(sink: ProgressSink | undefined, current: number, total: number, message: string): void {
    if (!sink) {
      return;
    }
    try {
      const pending = sink(current, total, message);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => log.warn('[EXECUTOR] Progress notification failed', error));
      }
    } catch (error) {
      log.warn('[EXECUTOR] Progress callback threw', error);
    }
  }
}
