import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError, errorCodeOf, errorMessageOf } from '../errors/syncErrors.js';
import { SiteValidator } from '../utils/validation.js';
import { SiteProfile } from '../sync/types.js';
import { log } from '../utils/logger.js';

/**
 * Site sync configuration file:
 *
 * ```json
 * {
 *   "stateDir": "~/.site-sync/state",
 *   "lockDir": "~/.site-sync/locks",
 *   "lockTimeoutMs": 0,
 *   "sites": [
 *     {
 *       "id": "blog",
 *       "localRoot": "/home/me/sites/blog",
 *       "remoteRoot": "/var/www/blog",
 *       "connection": { "host": "example.com", "port": 22, "username": "deploy", "auth": "key" },
 *       "exclusions": ["*.log", "node_modules/"],
 *       "pullScopes": ["wp-content/uploads"]
 *     }
 *   ]
 * }
 * ```
 *
 * Relative directories resolve against the config file's directory.
 */
export interface SiteSyncSettings {
  readonly configPath: string;
  readonly stateDir: string;
  readonly lockDir: string;
  readonly lockTimeoutMs: number;
  readonly sites: readonly SiteProfile[];
  /** Non-fatal findings from validation */
  readonly warnings: readonly string[];
}

export const CONFIG_ENV_VAR = 'SITE_SYNC_CONFIG';
const HOME_DIR = path.join(os.homedir(), '.site-sync');
export const DEFAULT_CONFIG_PATH = path.join(HOME_DIR, 'config.json');

function expandHome(dir: string): string {
  return dir === '~' || dir.startsWith('~/') ? path.join(os.homedir(), dir.slice(1)) : dir;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Lock wait override from SITE_SYNC_LOCK_TIMEOUT, in milliseconds
 */
function lockTimeoutFromEnv(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env.SITE_SYNC_LOCK_TIMEOUT;
  if (!raw) {
    return undefined;
  }
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed) || parsed < 0) {
    log.warn(`[CONFIG] Ignoring invalid SITE_SYNC_LOCK_TIMEOUT="${raw}"`);
    return undefined;
  }
  return parsed;
}

export class SiteSyncConfig {
  private readonly sitesById: ReadonlyMap<string, SiteProfile>;

  private constructor(readonly settings: SiteSyncSettings) {
    this.sitesById = new Map(settings.sites.map(site => [site.id, site]));
  }

  /**
   * Config path precedence: explicit argument, SITE_SYNC_CONFIG, ~/.site-sync/config.json
   */
  static resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
    const chosen = explicitPath || env[CONFIG_ENV_VAR] || DEFAULT_CONFIG_PATH;
    return path.resolve(expandHome(chosen));
  }

  /**
   * @throws ConfigurationError when the file is missing, unreadable or invalid
   */
  static async load(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<SiteSyncConfig> {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      const reason = errorCodeOf(error) === 'ENOENT' ? 'not found' : errorMessageOf(error);
      throw new ConfigurationError(`Config file ${configPath}: ${reason}`, 'configPath');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Config file ${configPath} is not valid JSON: ${errorMessageOf(error)}`, 'configPath');
    }

    const config = SiteSyncConfig.fromObject(raw, configPath, env);
    for (const warning of config.settings.warnings) {
      log.warn(`[CONFIG] ${warning}`);
    }
    log.info(`[CONFIG] Loaded ${config.settings.sites.length} site(s) from ${configPath}`);
    return config;
  }

  /**
   * Build from parsed JSON
   *
   * @throws ConfigurationError
   */
  static fromObject(raw: unknown, configPath: string, env: NodeJS.ProcessEnv = process.env): SiteSyncConfig {
    if (!isObject(raw)) {
      throw new ConfigurationError('Config root must be an object', 'config');
    }

    const baseDir = path.dirname(configPath);
    const resolveDir = (value: unknown, field: string, fallback: string): string => {
      if (value === undefined) {
        return fallback;
      }
      if (typeof value !== 'string' || value.trim().length === 0) {
        throw new ConfigurationError(`${field} must be a non-empty string`, field);
      }
      return path.resolve(baseDir, expandHome(value));
    };

    const fileTimeout = raw.lockTimeoutMs;
    if (fileTimeout !== undefined && (typeof fileTimeout !== 'number' || !Number.isFinite(fileTimeout) || fileTimeout < 0)) {
      throw new ConfigurationError('lockTimeoutMs must be a non-negative number', 'lockTimeoutMs');
    }

    const rawSites = raw.sites ?? [];
    if (!Array.isArray(rawSites)) {
      throw new ConfigurationError('sites must be a list', 'sites');
    }

    const sites: SiteProfile[] = [];
    const warnings: string[] = [];
    const seen = new Set<string>();

    rawSites.forEach((entry: unknown, index: number) => {
      const { profile, warnings: siteWarnings } = SiteValidator.validateSiteProfile(entry, `sites[${index}]`);
      if (seen.has(profile.id)) {
        throw new ConfigurationError(`Duplicate site id "${profile.id}"`, `sites[${index}].id`);
      }
      seen.add(profile.id);
      sites.push(profile);
      warnings.push(...siteWarnings);
    });

    return new SiteSyncConfig(Object.freeze({
      configPath,
      stateDir: env.SITE_SYNC_STATE_DIR
        ? path.resolve(expandHome(env.SITE_SYNC_STATE_DIR))
        : resolveDir(raw.stateDir, 'stateDir', path.join(HOME_DIR, 'state')),
      lockDir: env.SITE_SYNC_LOCK_DIR
        ? path.resolve(expandHome(env.SITE_SYNC_LOCK_DIR))
        : resolveDir(raw.lockDir, 'lockDir', path.join(HOME_DIR, 'locks')),
      lockTimeoutMs: lockTimeoutFromEnv(env) ?? (typeof fileTimeout === 'number' ? fileTimeout : 0),
      sites: Object.freeze(sites),
      warnings: Object.freeze(warnings)
    }));
  }

  listSites(): readonly SiteProfile[] {
    return this.settings.sites;
  }

  /**
   * @throws ConfigurationError for an unknown id
   */
  getSite(siteId: string): SiteProfile {
    const site = this.sitesById.get(siteId);
    if (!site) {
      const known = Array.from(this.sitesById.keys());
      throw new ConfigurationError(
        `Unknown site "${siteId}"` + (known.length > 0 ? `. Configured: ${known.join(', ')}` : '. No sites configured'),
        'siteId'
      );
    }
    return site;
  }
}
