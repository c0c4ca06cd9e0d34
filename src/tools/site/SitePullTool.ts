/**
 * SitePullTool - download remote files modified inside a time window
 */

import { BaseTool, ToolAnnotations, ToolContext, ToolInputSchema } from '../base.js';
import { PullOrchestrator, PullRequest } from '../../sync/PullOrchestrator.js';
import { log } from '../../utils/logger.js';
import {
  OutcomeView,
  PlanView,
  SYNC_MODES,
  SiteSyncServices,
  ToolErrorResponse,
  failureResponse,
  handleError,
  outcomeView,
  planView,
  progressSinkOf
} from './shared.js';

interface WindowView {
  start: string;
  end: string;
  scopes?: string[];
}

interface PullPreviewResponse {
  success: true;
  operation: 'preview';
  siteId: string;
  direction: 'pull';
  window: WindowView;
  plan: PlanView;
  nextStep: string;
}

interface PullExecuteResponse extends OutcomeView {
  success: true;
  operation: 'execute';
  siteId: string;
  direction: 'pull';
  window: WindowView;
  plan: PlanView;
}

type PullResponse = PullPreviewResponse | PullExecuteResponse | ToolErrorResponse;

const timestampSchema = {
  oneOf: [
    { type: 'string', format: 'date-time' },
    { type: 'integer', minimum: 0 }
  ]
};

export class SitePullTool extends BaseTool {
  public name = 'site_pull';

  public description = `[SYNC] Pull files from a site's remote root whose modification time falls inside a window.

Only the configured pull scopes (or the scopePaths given) are scanned. Both window ends are inclusive. Local files are overwritten.

Modes:
- preview: connect and list matching files (no downloads)
- execute: download matching files`;

  public inputSchema: ToolInputSchema = {
    type: 'object',
    additionalProperties: false,
    properties: {
      siteId: {
        type: 'string',
        minLength: 1,
        description: 'Site id from the sync config (see site_list)'
      },
      mode: {
        type: 'string',
        enum: [...SYNC_MODES],
        default: 'preview',
        description: 'preview (list only) or execute (download)'
      },
      windowStart: {
        ...timestampSchema,
        description: 'Earliest remote modification time: ISO-8601 or epoch milliseconds'
      },
      windowEnd: {
        ...timestampSchema,
        description: 'Latest remote modification time: ISO-8601 or epoch milliseconds'
      },
      scopePaths: {
        type: 'array',
        items: { type: 'string' },
        description: 'Remote-relative directories to scan instead of the site\'s pullScopes'
      }
    },
    required: ['siteId', 'windowStart', 'windowEnd'],
    llmGuidance: {
      workflow: 'preview → review items → execute',
      window: 'Use the time range in which the remote content changed, e.g. the last day.',
      examples: [
        'site_pull({siteId: "blog", windowStart: "2024-05-01T00:00:00Z", windowEnd: "2024-05-02T00:00:00Z"})',
        'site_pull({siteId: "blog", mode: "execute", windowStart: 1714521600000, windowEnd: 1714608000000, scopePaths: ["uploads"]})'
      ]
    }
  };

  public annotations: ToolAnnotations = {
    title: 'Pull site',
    destructiveHint: true,
    openWorldHint: true
  };

  constructor(private readonly services: SiteSyncServices) {
    super();
  }

  async execute(params: Record<string, unknown>, context: ToolContext = {}): Promise<PullResponse> {
    let operation = 'preview';
    try {
      const siteId = this.validate.siteId(params.siteId, 'site_pull');
      const mode = this.validate.enum(params.mode, 'mode', SYNC_MODES, 'preview');
      operation = mode;
      const request: PullRequest = {
        windowStart: this.validate.timestamp(params.windowStart, 'windowStart'),
        windowEnd: this.validate.timestamp(params.windowEnd, 'windowEnd'),
        scopePaths: this.validate.stringArray(params.scopePaths, 'scopePaths')
      };
      const profile = this.services.config.getSite(siteId);
      const orchestrator = new PullOrchestrator(this.services);

      const window: WindowView = {
        start: request.windowStart.toISOString(),
        end: request.windowEnd.toISOString(),
        ...(request.scopePaths !== undefined && { scopes: [...request.scopePaths] })
      };

      log.info(`[SITE] pull ${mode} for ${siteId}: ${window.start} .. ${window.end}`);

      if (mode === 'preview') {
        const preview = await orchestrator.preview(profile, request);
        if (preview.status === 'aborted') {
          return failureResponse(operation, preview.error);
        }
        return {
          success: true,
          operation: 'preview',
          siteId,
          direction: 'pull',
          window,
          plan: planView(preview.plan.items, preview.plan.advisories),
          nextStep: preview.plan.items.length > 0
            ? 'Run site_pull again with mode "execute" and the same window'
            : 'Nothing modified in this window'
        };
      }

      const result = await orchestrator.execute(profile, request, {
        onProgress: progressSinkOf(context),
        signal: context.signal
      });
      if (result.status === 'aborted') {
        return failureResponse(operation, result.error);
      }
      return {
        success: true,
        operation: 'execute',
        siteId,
        direction: 'pull',
        window,
        plan: planView(result.plan.items, result.plan.advisories),
        ...outcomeView(result)
      };
    } catch (error) {
      return handleError(operation, error);
    }
  }
}
