#!/usr/bin/env node
import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { createServer } from "./mcpServer.js";
import { loadConfig, type ServerConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { SseSessions } from "./sseSessions.js";

async function serveSse(config: ServerConfig): Promise<void> {
  const sessions = new SseSessions<SSEServerTransport>(() => createServer(config));

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/sse") {
      if (req.method !== "GET") {
        res.writeHead(405, { "Content-Type": "text/plain" }).end("Method not allowed");
        return;
      }
      const transport = new SSEServerTransport("/message", res);
      const { sessionId } = transport;
      res.on("close", () => {
        sessions.close(sessionId).catch((error: unknown) => {
          logger.error(`Failed to close SSE session ${sessionId}`, error);
        });
      });
      await sessions.open(sessionId, transport);
      return;
    }

    if (url.pathname === "/message") {
      if (req.method !== "POST") {
        res.writeHead(405, { "Content-Type": "text/plain" }).end("Method not allowed");
        return;
      }
      const sessionId = url.searchParams.get("sessionId");
      const transport = sessionId ? sessions.transport(sessionId) : undefined;
      if (!transport) {
        res.writeHead(404, { "Content-Type": "text/plain" }).end("Unknown session");
        return;
      }
      await transport.handlePostMessage(req, res);
      return;
    }

    res.writeHead(404, { "Content-Type": "text/plain" }).end("Not found");
  }

  const httpServer = createHttpServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error(`Failed to handle ${req.method} ${req.url}`, error);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "text/plain" }).end("Internal server error");
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.port, () => resolve());
  });
  logger.info(`SSE MCP server running on :${config.port}`);
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  // Choose transport by ENV var
  if (config.transport === "sse") {
    await serveSse(config);
  } else {
    await createServer(config).connect(new StdioServerTransport());
    logger.info(`Pokemon MCP server running on stdio (upstream ${config.baseUrl})`);
  }
}

main().catch((error: unknown) => {
  logger.error("Server error:", error);
  process.exit(1);
});
