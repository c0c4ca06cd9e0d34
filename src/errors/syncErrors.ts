/**
 * Custom error classes for the site sync server.
 * Each carries a stable string code so tool responses can be rendered
 * without parsing messages.
 */

/**
 * Base error class for site sync operations
 */
export class SiteSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Missing or invalid site profile, config file, or operation input
 */
export class ConfigurationError extends SiteSyncError {
  constructor(message: string, public readonly field?: string, data?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { ...data, field });
  }
}

/**
 * The transfer channel could not be opened. Raised before any state is touched.
 */
export class ConnectionError extends SiteSyncError {
  constructor(
    message: string,
    public readonly host: string,
    public readonly port: number,
    public readonly cause?: unknown
  ) {
    super(message, 'CONNECTION_ERROR', {
      host,
      port,
      reason: cause instanceof Error ? cause.message : undefined
    });
  }
}

/**
 * Plan computation failed
 */
export class PlanningError extends SiteSyncError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'PLANNING_ERROR', {
      reason: cause instanceof Error ? cause.message : undefined
    });
  }
}

export type RevisionSourceErrorCode = 'NOT_A_REPOSITORY' | 'UNKNOWN_REVISION' | 'GIT_FAILED';

/**
 * Revision history could not be read. NOT_A_REPOSITORY and UNKNOWN_REVISION
 * point at site configuration rather than a transient fault.
 */
export class RevisionSourceError extends SiteSyncError {
  constructor(message: string, public readonly reason: RevisionSourceErrorCode, public readonly repoPath: string) {
    super(message, reason, { repoPath });
  }

  get isConfigurationFault(): boolean {
    return this.reason !== 'GIT_FAILED';
  }
}

/**
 * Sync state could not be read or written
 */
export class StateStoreError extends SiteSyncError {
  constructor(message: string, public readonly statePath: string, public readonly cause?: unknown) {
    super(message, 'STATE_STORE_ERROR', {
      statePath,
      reason: cause instanceof Error ? cause.message : undefined
    });
  }
}

export type CredentialKind = 'transportPassword' | 'transportKeyMaterial';

/**
 * No secret available for a site. The message names the lookup, never a value.
 */
export class CredentialNotFoundError extends SiteSyncError {
  constructor(public readonly siteId: string, public readonly kind: CredentialKind, hint?: string) {
    super(
      `No ${kind === 'transportPassword' ? 'password' : 'key material'} found for site "${siteId}"` +
        (hint ? ` (${hint})` : ''),
      'CREDENTIAL_NOT_FOUND',
      { siteId, kind }
    );
  }
}

/**
 * Another operation holds the site lock
 */
export class LockTimeoutError extends SiteSyncError {
  constructor(
    public readonly siteId: string,
    public readonly timeoutMs: number,
    public readonly operation: string,
    holder?: { pid: number; hostname: string; operation: string }
  ) {
    super(
      `Site "${siteId}" is busy` +
        (holder ? ` (${holder.operation} by PID ${holder.pid} on ${holder.hostname})` : '') +
        `; waited ${timeoutMs}ms for ${operation}`,
      'SITE_BUSY',
      { siteId, timeoutMs, operation, holder }
    );
  }
}

/**
 * Extract a node/ssh2 style error code, if any
 */
export function errorCodeOf(error: unknown): string | number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' || typeof code === 'number') {
      return code;
    }
  }
  return undefined;
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
