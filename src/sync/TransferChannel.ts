/**
 * TransferChannel - the remote file store the engine is written against.
 *
 * One channel is opened per operation and closed when it ends. Remote paths
 * are absolute POSIX paths.
 */

export type RemoteEntryType = 'file' | 'directory' | 'other';

export interface RemoteEntry {
  readonly name: string;
  readonly type: RemoteEntryType;
  /** Modification time, ms since epoch */
  readonly modifiedAt: number;
  readonly size: number;
}

/** Bytes moved so far for the current file */
export type ByteProgress = (transferred: number, total: number) => void;

export interface TransferChannel {
  /** Direct children of a remote directory */
  list(remoteDir: string): Promise<RemoteEntry[]>;

  exists(remotePath: string): Promise<boolean>;

  /** Create a directory and its ancestors; no error if already present */
  mkdirRecursive(remoteDir: string): Promise<void>;

  /** Upload one file, resolving with the bytes written */
  put(localPath: string, remotePath: string, onBytes?: ByteProgress): Promise<number>;

  /** Download one file, replacing any local copy, resolving with the bytes read */
  get(remotePath: string, localPath: string, onBytes?: ByteProgress): Promise<number>;

  chmod(remotePath: string, mode: number): Promise<void>;

  /** Remove a remote file; absent files are not an error */
  remove(remotePath: string): Promise<void>;

  close(): Promise<void>;
}

export interface ChannelEndpoint {
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly readyTimeoutMs?: number;
}

/**
 * Resolved secrets for one connection attempt. Never logged or persisted.
 */
export interface ChannelCredentials {
  readonly password?: string;
  readonly privateKey?: string;
}

export interface ChannelConnector {
  /** Open a channel or reject with ConnectionError */
  connect(endpoint: ChannelEndpoint, credentials: ChannelCredentials): Promise<TransferChannel>;
}
