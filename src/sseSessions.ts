import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { logger } from "./logger.js";

interface Session<T extends Transport> {
  transport: T;
  server: Server;
}

/**
 * Live SSE sessions by ID. Each session gets its own MCP server, since a
 * Server instance holds a single transport; closing a session closes both.
 */
export class SseSessions<T extends Transport> {
  private readonly sessions = new Map<string, Session<T>>();

  constructor(private readonly createMcpServer: () => Server) {}

  async open(sessionId: string, transport: T): Promise<void> {
    const server = this.createMcpServer();
    this.sessions.set(sessionId, { transport, server });
    await server.connect(transport);
    logger.info(`SSE session ${sessionId} opened`);
  }

  transport(sessionId: string): T | undefined {
    return this.sessions.get(sessionId)?.transport;
  }

  async close(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.sessions.delete(sessionId);
    await session.server.close();
    logger.info(`SSE session ${sessionId} closed`);
  }

  get size(): number {
    return this.sessions.size;
  }
}
