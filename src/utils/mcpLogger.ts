/**
 * Sync-engine logging that reaches the MCP client as `notifications/message`
 * once a server is registered, and stderr otherwise. Messages below the
 * configured SITE_SYNC_LOG_LEVEL are dropped on both paths.
 */

import { ServerContext } from '../server/ServerContext.js';
import { LogLevel, isLevelEnabled, log } from './logger.js';

type ClientLogLevel = 'debug' | 'info' | 'warning' | 'error';

const LOCAL_LEVEL: Record<ClientLogLevel, LogLevel> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error'
};

function emit(level: ClientLogLevel, source: string, data: unknown): void {
  const localLevel = LOCAL_LEVEL[level];
  if (!isLevelEnabled(localLevel)) {
    return;
  }

  if (!ServerContext.isInitialized()) {
    log[localLevel](`[${source}]`, data);
    return;
  }

  ServerContext.getInstance().server
    .sendLoggingMessage({ level, logger: source, data })
    .catch((error: unknown) => {
      // not connected yet, or the client went away
      log[localLevel](`[${source}]`, data);
      log.debug(`[${source}] client log delivery failed`, error);
    });
}

export const mcpLogger = {
  debug: (source: string, data: unknown): void => emit('debug', source, data),
  info: (source: string, data: unknown): void => emit('info', source, data),
  warning: (source: string, data: unknown): void => emit('warning', source, data),
  error: (source: string, data: unknown): void => emit('error', source, data)
};
