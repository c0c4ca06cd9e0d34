/**
 * SiteLockManager - one in-flight operation per site
 *
 * Push and pull on the same site share sync state, so they never overlap.
 * The lock is held in-process (a Set of site ids) and on disk, so two server
 * processes pointed at the same state also exclude each other.
 *
 * Lock Storage:
 * - Directory: configurable, default ~/.site-sync/locks
 * - Format: {siteId}.lock, mode 0600
 *
 * Lock File Content:
 * {
 *   "pid": 12345,
 *   "hostname": "build-box",
 *   "timestamp": 1704067200000,
 *   "operation": "push",
 *   "siteId": "blog"
 * }
 *
 * A lock left by a dead process on this host is removed on contact. Locks from
 * other hosts are trusted until they are older than STALE_LOCK_MAX_AGE.
 */

import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { LockTimeoutError, errorCodeOf } from '../errors/syncErrors.js';
import { log } from './logger.js';

const LOCK_RETRY_INTERVAL = 100;

const STALE_LOCK_MAX_AGE = 30 * 60 * 1000;

interface LockInfo {
  pid: number;
  hostname: string;
  timestamp: number;
  operation: string;
  siteId: string;
}

function isLockInfo(value: unknown): value is LockInfo {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return typeof candidate.pid === 'number' &&
    typeof candidate.hostname === 'string' &&
    typeof candidate.timestamp === 'number' &&
    typeof candidate.operation === 'string' &&
    typeof candidate.siteId === 'string';
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class SiteLockManager {
  private heldLocks: Set<string> = new Set();

  /**
   * @param lockDir - directory for lock files
   * @param defaultTimeoutMs - how long acquire waits; 0 means a single attempt
   */
  constructor(
    private readonly lockDir: string,
    private readonly defaultTimeoutMs: number = 0
  ) {}

  private getLockPath(siteId: string): string {
    const safeId = siteId.replace(/[^A-Za-z0-9._-]/g, '_');
    return path.join(this.lockDir, `${safeId}.lock`);
  }

  private async readLockInfo(lockPath: string): Promise<LockInfo | null> {
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(lockPath, 'utf-8'));
      return isLockInfo(parsed) ? parsed : null;
    } catch (error) {
      if (errorCodeOf(error) !== 'ENOENT') {
        log.warn(`[LOCK] Unreadable lock file ${lockPath}`, error);
      }
      return null;
    }
  }

  /**
   * Signal 0 checks for existence without affecting the process
   */
  private isProcessRunning(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      // EPERM: exists but owned by someone else
      return errorCodeOf(error) === 'EPERM';
    }
  }

  private isLockStale(lockInfo: LockInfo): boolean {
    if (lockInfo.hostname !== os.hostname()) {
      return Date.now() - lockInfo.timestamp > STALE_LOCK_MAX_AGE;
    }
    return !this.isProcessRunning(lockInfo.pid);
  }

  /**
   * Acquire the lock for a site
   *
   * @throws LockTimeoutError if another operation holds it past the timeout
   */
  async acquireLock(siteId: string, operation: string, timeoutMs: number = this.defaultTimeoutMs): Promise<void> {
    const deadline = Date.now() + timeoutMs;

    // In-process first: the lock file belongs to this pid and would never look stale
    while (this.heldLocks.has(siteId)) {
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(siteId, timeoutMs, operation,
          { pid: process.pid, hostname: os.hostname(), operation: 'another operation' });
      }
      await sleep(LOCK_RETRY_INTERVAL);
    }
    this.heldLocks.add(siteId);

    try {
      await this.acquireFileLock(siteId, operation, timeoutMs, deadline);
    } catch (error) {
      this.heldLocks.delete(siteId);
      throw error;
    }
    log.debug(`[LOCK] Acquired ${siteId} (${operation})`);
  }

  private async acquireFileLock(siteId: string, operation: string, timeoutMs: number, deadline: number): Promise<void> {
    await fs.mkdir(this.lockDir, { recursive: true, mode: 0o700 });

    const lockPath = this.getLockPath(siteId);
    const lockInfo: LockInfo = {
      pid: process.pid,
      hostname: os.hostname(),
      timestamp: Date.now(),
      operation,
      siteId
    };

    for (;;) {
      try {
        await fs.writeFile(lockPath, JSON.stringify(lockInfo, null, 2), { mode: 0o600, flag: 'wx' });
        return;
      } catch (error) {
        if (errorCodeOf(error) !== 'EEXIST') {
          throw error;
        }
      }

      const existing = await this.readLockInfo(lockPath);
      if (existing && this.isLockStale(existing)) {
        log.warn(`[LOCK] Removing stale lock for ${siteId} (PID ${existing.pid} on ${existing.hostname})`);
        await fs.rm(lockPath, { force: true });
        continue;
      }

      if (Date.now() >= deadline) {
        throw new LockTimeoutError(siteId, timeoutMs, operation, existing ?? undefined);
      }
      await sleep(LOCK_RETRY_INTERVAL);
    }
  }

  /**
   * Release the lock for a site. Safe to call when not held.
   */
  async releaseLock(siteId: string): Promise<void> {
    if (!this.heldLocks.has(siteId)) {
      return;
    }

    const lockPath = this.getLockPath(siteId);
    try {
      await fs.unlink(lockPath);
      log.debug(`[LOCK] Released ${siteId}`);
    } catch (error) {
      if (errorCodeOf(error) !== 'ENOENT') {
        log.warn(`[LOCK] Failed to remove ${lockPath}; it will be treated as stale later`, error);
      }
    } finally {
      this.heldLocks.delete(siteId);
    }
  }

  /**
   * Run `task` while holding the site lock
   */
  async withLock<T>(siteId: string, operation: string, task: () => Promise<T>): Promise<T> {
    await this.acquireLock(siteId, operation);
    try {
      return await task();
    } finally {
      await this.releaseLock(siteId);
    }
  }

  isHeld(siteId: string): boolean {
    return this.heldLocks.has(siteId);
  }

  /**
   * Called on shutdown
   */
  async releaseAllLocks(): Promise<void> {
    await Promise.all(Array.from(this.heldLocks).map(siteId => this.releaseLock(siteId)));
  }
}
