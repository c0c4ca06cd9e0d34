/**
 * Site sync tool exports
 */

import { BaseTool } from '../base.js';
import { SitePushTool } from './SitePushTool.js';
import { SitePullTool } from './SitePullTool.js';
import { SiteListTool, SiteStatusTool, SiteTestConnectionTool } from './SiteInfoTools.js';
import { SiteSyncServices } from './shared.js';

export { SitePushTool } from './SitePushTool.js';
export { SitePullTool } from './SitePullTool.js';
export { SiteListTool, SiteStatusTool, SiteTestConnectionTool } from './SiteInfoTools.js';
export { MAX_LISTED_ITEMS, errorResponse, handleError } from './shared.js';
export type { SiteSyncServices, ToolErrorResponse, PlanView, OutcomeView } from './shared.js';

export function createSiteTools(services: SiteSyncServices): BaseTool[] {
  return [
    new SiteListTool(services),
    new SiteStatusTool(services),
    new SiteTestConnectionTool(services),
    new SitePushTool(services),
    new SitePullTool(services)
  ];
}
