import { describe, it, expect, vi } from "vitest";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createServer } from "../mcpServer.js";
import { SseSessions } from "../sseSessions.js";
import { jsonResponse, pikachu, testConfig } from "./fixtures.js";

function newSessions() {
  const servers: ReturnType<typeof createServer>[] = [];
  const sessions = new SseSessions<InMemoryTransport>(() => {
    const server = createServer(testConfig(vi.fn<typeof fetch>(async () => jsonResponse(pikachu))));
    servers.push(server);
    return server;
  });
  return { sessions, servers };
}

describe("SseSessions", () => {
  it("gives every session its own server", async () => {
    const { sessions, servers } = newSessions();
    const [, first] = InMemoryTransport.createLinkedPair();
    const [, second] = InMemoryTransport.createLinkedPair();

    await sessions.open("a", first);
    await sessions.open("b", second);

    expect(servers).toHaveLength(2);
    expect(sessions.transport("a")).toBe(first);
    expect(sessions.transport("b")).toBe(second);
  });

  it("closes the session's server when the session ends", async () => {
    const { sessions, servers } = newSessions();
    const [, transport] = InMemoryTransport.createLinkedPair();
    await sessions.open("a", transport);
    const [server] = servers;
    if (!server) throw new Error("expected a server");
    const closeSpy = vi.spyOn(server, "close");

    await sessions.close("a");

    expect(closeSpy).toHaveBeenCalledTimes(1);
    expect(sessions.transport("a")).toBeUndefined();
    expect(sessions.size).toBe(0);
  });

  it("ignores an unknown session", async () => {
    const { sessions } = newSessions();

    await expect(sessions.close("missing")).resolves.toBeUndefined();
  });
});
