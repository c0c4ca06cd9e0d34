/**
 * SitePushTool - upload files changed in git since the last push
 *
 * preview plans without connecting; execute plans the same way, then
 * uploads and records the revision.
 */

import { BaseTool, ToolAnnotations, ToolContext, ToolInputSchema } from '../base.js';
import { PushOrchestrator } from '../../sync/PushOrchestrator.js';
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

interface RevisionView {
  current: string;
  base?: string;
  summary?: string;
}

interface PushPreviewResponse {
  success: true;
  operation: 'preview';
  siteId: string;
  direction: 'push';
  revision: RevisionView;
  plan: PlanView;
  nextStep: string;
}

interface PushExecuteResponse extends OutcomeView {
  success: true;
  operation: 'execute';
  siteId: string;
  direction: 'push';
  revision?: string;
  plan: PlanView;
}

type PushResponse = PushPreviewResponse | PushExecuteResponse | ToolErrorResponse;

export class SitePushTool extends BaseTool {
  public name = 'site_push';

  public description = `[SYNC] Push a site's local changes to its remote root over SFTP.

Files are selected from git: everything tracked on the first push, then only files changed between the last pushed revision and HEAD, plus paths that failed last time. Exclusion rules and .syncignore apply.

Modes:
- preview: list what would be uploaded (no connection, no changes)
- execute: upload and record the revision`;

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
        description: 'preview (plan only) or execute (upload)'
      }
    },
    required: ['siteId'],
    llmGuidance: {
      workflow: 'preview → review items → execute',
      firstPush: 'Without a recorded revision every tracked, non-excluded file is uploaded.',
      partial: 'Failed and cancelled paths are retried by the next push.',
      examples: [
        'site_push({siteId: "blog"})',
        'site_push({siteId: "blog", mode: "execute"})'
      ]
    }
  };

  public annotations: ToolAnnotations = {
    title: 'Push site',
    destructiveHint: true,
    openWorldHint: true
  };

  constructor(private readonly services: SiteSyncServices) {
    super();
  }

  async execute(params: Record<string, unknown>, context: ToolContext = {}): Promise<PushResponse> {
    let operation = 'preview';
    try {
      const siteId = this.validate.siteId(params.siteId, 'site_push');
      const mode = this.validate.enum(params.mode, 'mode', SYNC_MODES, 'preview');
      operation = mode;
      const profile = this.services.config.getSite(siteId);
      const orchestrator = new PushOrchestrator(this.services);

      log.info(`[SITE] push ${mode} for ${siteId}`);

      if (mode === 'preview') {
        const preview = await orchestrator.preview(profile);
        if (preview.status === 'aborted') {
          return failureResponse(operation, preview.error);
        }
        return {
          success: true,
          operation: 'preview',
          siteId,
          direction: 'push',
          revision: {
            current: preview.currentRevision,
            ...(preview.baseRevision !== undefined && { base: preview.baseRevision }),
            ...(preview.revisionSummary !== undefined && { summary: preview.revisionSummary })
          },
          plan: planView(preview.plan.items, preview.plan.advisories),
          nextStep: preview.plan.items.length > 0
            ? `site_push({siteId: "${siteId}", mode: "execute"})`
            : 'Nothing to push'
        };
      }

      const result = await orchestrator.execute(profile, {
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
        direction: 'push',
        ...(result.revision !== undefined && { revision: result.revision }),
        plan: planView(result.plan.items, result.plan.advisories),
        ...outcomeView(result)
      };
    } catch (error) {
      return handleError(operation, error);
    }
  }
}
