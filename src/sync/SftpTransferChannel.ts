/**
 * SFTP-backed TransferChannel using ssh2-sftp-client.
 */

import { promises as fs } from 'fs';
import path from 'path';
import SftpClient from 'ssh2-sftp-client';
import {
  ByteProgress,
  ChannelConnector,
  ChannelCredentials,
  ChannelEndpoint,
  RemoteEntry,
  TransferChannel
} from './TransferChannel.js';
import { ConnectionError, errorMessageOf } from '../errors/syncErrors.js';
import { log } from '../utils/logger.js';

const DEFAULT_READY_TIMEOUT_MS = 20000;

export class SftpTransferChannel implements TransferChannel {
  // Directories known to exist during this session
  private knownDirs = new Set<string>();

  constructor(private readonly client: SftpClient, private readonly label: string) {}

  async list(remoteDir: string): Promise<RemoteEntry[]> {
    const entries = await this.client.list(remoteDir);
    return entries
      .filter(entry => entry.name !== '.' && entry.name !== '..')
      .map((entry): RemoteEntry => ({
        name: entry.name,
        type: entry.type === 'd' ? 'directory' : entry.type === '-' ? 'file' : 'other',
        modifiedAt: entry.modifyTime,
        size: entry.size
      }));
  }

  async exists(remotePath: string): Promise<boolean> {
    return (await this.client.exists(remotePath)) !== false;
  }

  async mkdirRecursive(remoteDir: string): Promise<void> {
    const normalized = path.posix.normalize(remoteDir);
    if (normalized === '/' || normalized === '.' || this.knownDirs.has(normalized)) {
      return;
    }

    const kind = await this.client.exists(normalized);
    // exists() does not follow links; a link to a directory is usable as one
    if (kind === 'd' || (kind === 'l' && (await this.client.stat(normalized)).isDirectory)) {
      this.knownDirs.add(normalized);
      return;
    }

    await this.mkdirRecursive(path.posix.dirname(normalized));
    await this.client.mkdir(normalized, false);
    log.debug(`[SFTP] ${this.label}: created ${normalized}`);
    this.knownDirs.add(normalized);
  }

  async put(localPath: string, remotePath: string, onBytes?: ByteProgress): Promise<number> {
    const { size } = await fs.stat(localPath);
    await this.client.fastPut(localPath, remotePath, {
      step: (transferred: number, _chunk: number, total: number) => onBytes?.(transferred, total)
    });
    return size;
  }

  async get(remotePath: string, localPath: string, onBytes?: ByteProgress): Promise<number> {
    await this.client.fastGet(remotePath, localPath, {
      step: (transferred: number, _chunk: number, total: number) => onBytes?.(transferred, total)
    });
    const { size } = await fs.stat(localPath);
    return size;
  }

  async chmod(remotePath: string, mode: number): Promise<void> {
    await this.client.chmod(remotePath, mode);
  }

  async remove(remotePath: string): Promise<void> {
    await this.client.delete(remotePath, true);
  }

  async close(): Promise<void> {
    await this.client.end();
    log.debug(`[SFTP] ${this.label}: closed`);
  }
}

export class SftpChannelConnector implements ChannelConnector {
  async connect(endpoint: ChannelEndpoint, credentials: ChannelCredentials): Promise<TransferChannel> {
    const label = `${endpoint.username}@${endpoint.host}:${endpoint.port}`;
    const client = new SftpClient(`site-sync ${label}`);

    try {
      await client.connect({
        host: endpoint.host,
        port: endpoint.port,
        username: endpoint.username,
        password: credentials.password,
        privateKey: credentials.privateKey,
        readyTimeout: endpoint.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS
      });
    } catch (error) {
      throw new ConnectionError(`Cannot connect to ${label}: ${errorMessageOf(error)}`, endpoint.host, endpoint.port, error);
    }

    log.info(`[SFTP] Connected to ${label}`);
    return new SftpTransferChannel(client, label);
  }
}
