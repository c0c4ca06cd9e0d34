/**
 * Read-only site tools: list, status, test_connection
 */

import { BaseTool, ToolAnnotations, ToolInputSchema } from '../base.js';
import { testConnection } from '../../sync/ConnectionTester.js';
import { PullRecord, PushRecord } from '../../sync/types.js';
import { SiteSyncServices, ToolErrorResponse, failureResponse, handleError } from './shared.js';

const siteIdSchema: ToolInputSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    siteId: {
      type: 'string',
      minLength: 1,
      description: 'Site id from the sync config (see site_list)'
    }
  },
  required: ['siteId']
};

interface SiteSummary {
  id: string;
  name?: string;
  localRoot: string;
  remoteRoot: string;
  host: string;
  port: number;
  username: string;
  auth: string;
  pullScopes: string[];
  exclusionCount: number;
  mirrorDeletions: boolean;
}

interface SiteListResponse {
  success: true;
  operation: 'list';
  configPath: string;
  sites: SiteSummary[];
}

export class SiteListTool extends BaseTool {
  public name = 'site_list';

  public description = '[SYNC] List the configured sites with their roots and hosts.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    additionalProperties: false,
    properties: {}
  };

  public annotations: ToolAnnotations = {
    title: 'List sites',
    readOnlyHint: true
  };

  constructor(private readonly services: SiteSyncServices) {
    super();
  }

  async execute(): Promise<SiteListResponse> {
    const { config } = this.services;
    return {
      success: true,
      operation: 'list',
      configPath: config.settings.configPath,
      sites: config.listSites().map(site => ({
        id: site.id,
        ...(site.name !== undefined && { name: site.name }),
        localRoot: site.localRoot,
        remoteRoot: site.remoteRoot,
        host: site.connection.host,
        port: site.connection.port,
        username: site.connection.username,
        auth: site.connection.auth,
        pullScopes: [...site.pullScopes],
        exclusionCount: site.exclusions.length,
        mirrorDeletions: site.mirrorDeletions === true
      }))
    };
  }
}

interface SiteStatusResponse {
  success: true;
  operation: 'status';
  siteId: string;
  busy: boolean;
  lastPush: PushRecord | null;
  lastPull: PullRecord | null;
}

export class SiteStatusTool extends BaseTool {
  public name = 'site_status';

  public description = '[SYNC] Show the last recorded push and pull for a site.';

  public inputSchema: ToolInputSchema = siteIdSchema;

  public annotations: ToolAnnotations = {
    title: 'Site status',
    readOnlyHint: true
  };

  constructor(private readonly services: SiteSyncServices) {
    super();
  }

  async execute(params: Record<string, unknown>): Promise<SiteStatusResponse | ToolErrorResponse> {
    try {
      const siteId = this.validate.siteId(params.siteId, 'site_status');
      this.services.config.getSite(siteId);
      const state = await this.services.stateStore.getSiteState(siteId);
      return {
        success: true,
        operation: 'status',
        siteId,
        busy: this.services.locks.isHeld(siteId),
        lastPush: state.lastPush ?? null,
        lastPull: state.lastPull ?? null
      };
    } catch (error) {
      return handleError('status', error);
    }
  }
}

interface ConnectionTestResponse {
  success: true;
  operation: 'test_connection';
  siteId: string;
  remoteRoot: string;
  remoteRootExists: boolean;
  elapsedMs: number;
}

export class SiteTestConnectionTool extends BaseTool {
  public name = 'site_test_connection';

  public description = '[SYNC] Connect to a site over SFTP and check that its remote root exists. Transfers nothing.';

  public inputSchema: ToolInputSchema = siteIdSchema;

  public annotations: ToolAnnotations = {
    title: 'Test site connection',
    readOnlyHint: true,
    openWorldHint: true
  };

  constructor(private readonly services: SiteSyncServices) {
    super();
  }

  async execute(params: Record<string, unknown>): Promise<ConnectionTestResponse | ToolErrorResponse> {
    try {
      const siteId = this.validate.siteId(params.siteId, 'site_test_connection');
      const profile = this.services.config.getSite(siteId);
      const result = await testConnection(profile, this.services);
      if (!result.ok) {
        return failureResponse('test_connection', result.error);
      }
      return {
        success: true,
        operation: 'test_connection',
        siteId,
        remoteRoot: profile.remoteRoot,
        remoteRootExists: result.remoteRootExists,
        elapsedMs: result.elapsedMs
      };
    } catch (error) {
      return handleError('test_connection', error);
    }
  }
}
