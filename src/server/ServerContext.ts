import { Server } from '@modelcontextprotocol/sdk/server/index.js';

/**
 * Holds the connected MCP Server so logging can reach the client.
 * Initialized once in mcpServer.ts after the server is created.
 */
export class ServerContext {
  private static instance: ServerContext | undefined;

  private constructor(public readonly server: Server) {}

  static initialize(server: Server): void {
    ServerContext.instance = new ServerContext(server);
  }

  static getInstance(): ServerContext {
    if (!ServerContext.instance) {
      throw new Error('ServerContext not initialized. Call ServerContext.initialize(server) first.');
    }
    return ServerContext.instance;
  }

  static isInitialized(): boolean {
    return ServerContext.instance !== undefined;
  }

  static reset(): void {
    ServerContext.instance = undefined;
  }
}
