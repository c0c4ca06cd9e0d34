#!/usr/bin/env node

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { SiteSyncServer } from './server/mcpServer.js';
import { SiteSyncConfig } from './config/siteSyncConfig.js';
import { EnvironmentCredentialProvider } from './credentials/CredentialProvider.js';
import { SftpChannelConnector } from './sync/SftpTransferChannel.js';
import { SyncStateStore } from './sync/SyncStateStore.js';
import { gitRevisionSourceFactory } from './sync/RevisionDiffSource.js';
import { SiteLockManager } from './utils/lockManager.js';
import { ConfigurationError } from './errors/syncErrors.js';
import { SiteSyncServices } from './tools/site/index.js';
import { log } from './utils/logger.js';

/**
 * Parse command line arguments
 */
function parseArgs(argv: string[]): { configPath?: string } {
  const result: { configPath?: string } = {};

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--config' || argv[i] === '-c') {
      if (i + 1 < argv.length) {
        result.configPath = argv[i + 1];
        i++;
      } else {
        log.error('--config requires a file path');
        process.exit(1);
      }
    }
  }

  return result;
}

async function buildServices(configPath: string): Promise<SiteSyncServices> {
  const config = await SiteSyncConfig.load(configPath);
  const { stateDir, lockDir, lockTimeoutMs } = config.settings;

  return {
    config,
    stateStore: new SyncStateStore(stateDir),
    credentials: new EnvironmentCredentialProvider(),
    connector: new SftpChannelConnector(),
    locks: new SiteLockManager(lockDir, lockTimeoutMs),
    revisionSource: gitRevisionSourceFactory
  };
}

async function main(): Promise<void> {
  const configPath = SiteSyncConfig.resolveConfigPath(parseArgs(process.argv.slice(2)).configPath);
  log.info(`Using config file: ${configPath}`);

  let services: SiteSyncServices;
  try {
    services = await buildServices(configPath);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(error.message);
      log.error('Usage: site-sync-mcp --config <path>  (or set SITE_SYNC_CONFIG)');
      process.exit(1);
    }
    throw error;
  }

  const server = new SiteSyncServer(services);
  let shuttingDown = false;

  const shutdown = async (reason: string, exitCode: number) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info(`Received ${reason}, shutting down...`);

    try {
      await server.stop();
      process.exit(exitCode);
    } catch (error) {
      log.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT', 0));
  process.once('SIGTERM', () => void shutdown('SIGTERM', 0));

  process.on('uncaughtException', (error: Error) => {
    log.error('Uncaught Exception:', error);
    void shutdown('uncaughtException', 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    log.error('Unhandled Rejection:', reason);
    void shutdown('unhandledRejection', 1);
  });

  await server.start();
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  // npm links the bin, so compare resolved paths
  return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    log.error('Fatal error:', error);
    process.exit(1);
  });
}
