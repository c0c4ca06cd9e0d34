import { expect } from 'chai';
import path from 'path';
import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { SiteSyncServer } from '../../../src/server/mcpServer.js';
import { ServerContext } from '../../../src/server/ServerContext.js';
import { SiteSyncConfig } from '../../../src/config/siteSyncConfig.js';
import { SyncStateStore } from '../../../src/sync/SyncStateStore.js';
import { SiteLockManager } from '../../../src/utils/lockManager.js';
import { ConfigurationError } from '../../../src/errors/syncErrors.js';
import { BaseTool, ToolContext, ToolInputSchema } from '../../../src/tools/base.js';
import { SiteSyncServices } from '../../../src/tools/site/index.js';
import { FakeConnector, FakeRevisionSource, StaticCredentials, makeTempDir, removeDir } from '../../helpers/fakes.js';

class ScriptedTool extends BaseTool {
  public description = 'Test tool';
  public inputSchema: ToolInputSchema = { type: 'object', properties: {} };
  public lastContext?: ToolContext;

  constructor(public name: string, private readonly behavior: (params: Record<string, unknown>) => unknown) {
    super();
  }

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<unknown> {
    this.lastContext = context;
    return this.behavior(params);
  }
}

function payloadOf(result: CallToolResult): unknown {
  const first = result.content[0];
  if (!first || first.type !== 'text') {
    throw new Error('expected text content');
  }
  return JSON.parse(first.text);
}

describe('SiteSyncServer', () => {
  let workDir: string;
  let services: SiteSyncServices;
  let echo: ScriptedTool;
  let server: SiteSyncServer;

  beforeEach(async () => {
    workDir = await makeTempDir();
    const config = SiteSyncConfig.fromObject(
      { stateDir: 'state', lockDir: 'locks' },
      path.join(workDir, 'config.json'),
      {}
    );
    services = {
      config,
      stateStore: new SyncStateStore(config.settings.stateDir),
      credentials: new StaticCredentials(),
      connector: new FakeConnector(),
      locks: new SiteLockManager(config.settings.lockDir),
      revisionSource: () => new FakeRevisionSource()
    };
    echo = new ScriptedTool('echo', params => ({ success: true, operation: 'echo', params }));
    server = new SiteSyncServer(services, [
      echo,
      new ScriptedTool('refuse', () => ({ success: false, operation: 'refuse', error: { code: 'X', message: 'no' } })),
      new ScriptedTool('misconfigured', () => {
        throw new ConfigurationError('siteId is required', 'siteId');
      }),
      new ScriptedTool('crash', () => {
        throw new RangeError('out of range');
      })
    ]);
  });

  afterEach(async () => {
    await server.stop();
    await removeDir(workDir);
  });

  it('registers itself for client logging', () => {
    expect(ServerContext.isInitialized()).to.be.true;
  });

  it('returns tool results as JSON text', async () => {
    const result = await server.callTool('echo', { siteId: 'blog' });

    expect(result.isError).to.be.undefined;
    expect(payloadOf(result)).to.deep.equal({ success: true, operation: 'echo', params: { siteId: 'blog' } });
  });

  it('passes the call context to the tool', async () => {
    const controller = new AbortController();

    await server.callTool('echo', {}, { signal: controller.signal });

    expect(echo.lastContext?.signal).to.equal(controller.signal);
  });

  it('flags unsuccessful results as errors', async () => {
    const result = await server.callTool('refuse', {});

    expect(result.isError).to.be.true;
    expect(payloadOf(result)).to.deep.include({ success: false, operation: 'refuse' });
  });

  it('reports an unknown tool', async () => {
    const result = await server.callTool('site_delete', {});

    expect(result.isError).to.be.true;
    expect(payloadOf(result)).to.deep.equal({ error: { type: 'UnknownTool', message: 'Unknown tool: site_delete' } });
  });

  it('renders thrown sync errors with their code', async () => {
    const result = await server.callTool('misconfigured', {});

    expect(result.isError).to.be.true;
    expect(payloadOf(result)).to.deep.equal({
      error: {
        type: 'ConfigurationError',
        message: 'siteId is required',
        code: 'CONFIGURATION_ERROR',
        data: { field: 'siteId' }
      }
    });
  });

  it('renders anything else as an unknown error', async () => {
    const result = await server.callTool('crash', {});

    expect(payloadOf(result)).to.deep.equal({ error: { type: 'UnknownError', message: 'out of range' } });
  });

  it('releases held locks and the logging context on stop', async () => {
    await services.locks.acquireLock('blog', 'push');

    await server.stop();

    expect(services.locks.isHeld('blog')).to.be.false;
    expect(ServerContext.isInitialized()).to.be.false;
  });
});
