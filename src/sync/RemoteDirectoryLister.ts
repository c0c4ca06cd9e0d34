/**
 * RemoteDirectoryLister - recursive remote enumeration over a TransferChannel
 */

import path from 'path';
import { RemoteEntry, TransferChannel } from './TransferChannel.js';
import { classifyTransferError } from './TransferExecutor.js';
import { errorMessageOf } from '../errors/syncErrors.js';
import { log } from '../utils/logger.js';

export interface RemoteFileEntry {
  /** Relative to the base directory passed to listRecursive */
  readonly relativePath: string;
  readonly modifiedAt: number;
  readonly size: number;
}

export interface UnreadableDirectory {
  /** Relative to the base directory; '' for the base itself */
  readonly relativePath: string;
  readonly message: string;
}

export class RemoteDirectoryLister {
  constructor(private readonly channel: TransferChannel) {}

  exists(remotePath: string): Promise<boolean> {
    return this.channel.exists(remotePath);
  }

  /**
   * Every regular file under `baseDir/subPath`, with paths relative to baseDir.
   * Directories are walked, never returned. Symlinks and special files are skipped.
   *
   * With `onUnreadable`, a directory that cannot be listed is reported there and
   * its subtree skipped; without it, the listing error propagates. Connection
   * failures always propagate.
   */
  async listRecursive(
    baseDir: string,
    subPath: string = '',
    onUnreadable?: (directory: UnreadableDirectory) => void
  ): Promise<RemoteFileEntry[]> {
    const files: RemoteFileEntry[] = [];
    const pending: string[] = [subPath];

    while (pending.length > 0) {
      const relativeDir = pending.pop() ?? '';
      const absoluteDir = relativeDir ? path.posix.join(baseDir, relativeDir) : baseDir;

      let entries: RemoteEntry[];
      try {
        entries = await this.channel.list(absoluteDir);
      } catch (error) {
        if (!onUnreadable || classifyTransferError(error) === 'connection') {
          throw error;
        }
        log.warn(`[LISTER] Skipping ${absoluteDir}: ${errorMessageOf(error)}`);
        onUnreadable({ relativePath: relativeDir, message: errorMessageOf(error) });
        continue;
      }

      for (const entry of entries) {
        const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

        if (entry.type === 'directory') {
          pending.push(relativePath);
        } else if (entry.type === 'file') {
          files.push({ relativePath, modifiedAt: entry.modifiedAt, size: entry.size });
        } else {
          log.debug(`[LISTER] Skipping non-regular entry ${relativePath}`);
        }
      }
    }

    return files.sort((a, b) => compareRelativePaths(a.relativePath, b.relativePath));
  }
}

/**
 * Stable code-unit ordering so plans do not depend on locale
 */
export function compareRelativePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
