import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, CallToolResult, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { ServerContext } from './ServerContext.js';
import { BaseTool, ToolContext } from '../tools/base.js';
import { SiteSyncServices, createSiteTools } from '../tools/site/index.js';
import { SiteSyncError, errorMessageOf } from '../errors/syncErrors.js';
import { log } from '../utils/logger.js';

type ProgressToken = string | number;

type Notify = (notification: {
  method: 'notifications/progress';
  params: { progressToken: ProgressToken; progress: number; total: number; message: string };
}) => Promise<void>;

function jsonContent(payload: unknown, isError = false): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2)
      }
    ],
    ...(isError && { isError: true })
  };
}

/**
 * Tool results with `success: false` are reported to the client as errors
 */
function isFailedResult(result: unknown): boolean {
  return typeof result === 'object' && result !== null && 'success' in result && result.success === false;
}

/**
 * Site sync MCP server
 *
 * One set of tools for the process lifetime; they share the loaded config,
 * the state store and the lock manager.
 */
export class SiteSyncServer {
  private server: Server;
  private tools: Map<string, BaseTool>;

  constructor(private readonly services: SiteSyncServices, tools: BaseTool[] = createSiteTools(services)) {
    this.server = new Server(
      {
        name: 'site-sync',
        version: '1.0.0'
      },
      {
        capabilities: {
          tools: {},
          logging: {}
        }
      }
    );
    this.tools = new Map(tools.map(tool => [tool.name, tool]));

    ServerContext.initialize(this.server);
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: Array.from(this.tools.values()).map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
        ...(tool.annotations && { annotations: tool.annotations })
      }))
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      const progressToken = request.params._meta?.progressToken;

      return this.callTool(name, args ?? {}, {
        signal: extra.signal,
        ...(progressToken !== undefined && {
          sendProgress: this.progressSender(progressToken, extra.sendNotification)
        })
      });
    });
  }

  private progressSender(progressToken: ProgressToken, notify: Notify): ToolContext['sendProgress'] {
    return (progress, total, message) =>
      notify({
        method: 'notifications/progress',
        params: { progressToken, progress, total, message }
      });
  }

  /**
   * Run a tool and wrap its result as MCP text content
   */
  async callTool(name: string, args: Record<string, unknown>, context: ToolContext = {}): Promise<CallToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return jsonContent({ error: { type: 'UnknownTool', message: `Unknown tool: ${name}` } }, true);
    }

    log.info(`Executing tool: ${name}`);
    try {
      const result = await tool.execute(args, context);
      return jsonContent(result, isFailedResult(result));
    } catch (error) {
      log.error(`Tool ${name} failed:`, error);

      if (error instanceof SiteSyncError) {
        return jsonContent({
          error: {
            type: error.name,
            message: error.message,
            code: error.code,
            data: error.data
          }
        }, true);
      }

      return jsonContent({
        error: {
          type: 'UnknownError',
          message: errorMessageOf(error) || 'An unexpected error occurred'
        }
      }, true);
    }
  }

  async start(): Promise<void> {
    log.info(`Starting site sync server (${this.services.config.listSites().length} site(s))...`);

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    log.info('Site sync server connected and ready');
  }

  async stop(): Promise<void> {
    log.info('Stopping site sync server...');
    await this.services.locks.releaseAllLocks();
    await this.server.close();
    ServerContext.reset();
    log.info('Site sync server stopped');
  }
}
