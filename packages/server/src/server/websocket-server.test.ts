import pino from "pino";
import { afterEach, describe, expect, test, vi } from "vitest";
import { completedResponse, type ChatMessageRequest } from "../shared/messages.js";
import { MockSocket } from "../test-utils/mock-socket.js";
import type { ConnectionSettings } from "./config.js";
import { ConnectionRegistry } from "./connection-registry.js";
import type { ChatRequestHandler } from "./protocol-handler.js";
import type { ResponseSink } from "./request-processor.js";
import { ChatWebSocketServer } from "./websocket-server.js";

const logger = pino({ level: "silent" });

const SETTINGS: ConnectionSettings = {
  pingIntervalMs: 30_000,
  pongTimeoutMs: 120_000,
  idleTimeoutMs: null,
  sendTimeoutMs: 5_000,
  queueCapacity: 16,
};

function createServer(connection: Partial<ConnectionSettings> = {}) {
  const registry = new ConnectionRegistry();
  const processor: ChatRequestHandler = {
    process: vi.fn(async (request: ChatMessageRequest, reply: ResponseSink) => {
      await reply(completedResponse(`echo: ${request.prompt}`, request.provider, false));
    }),
  };
  const server = new ChatWebSocketServer({
    registry,
    processor,
    connection: { ...SETTINGS, ...connection },
    circuitBreaker: { threshold: 5, timeoutMs: 60_000 },
    maxFilesPerRequest: 50,
    maxFrameBytes: 1024 * 1024,
    logger,
  });
  return { server, registry, processor };
}

describe("ChatWebSocketServer", () => {
  const servers: ChatWebSocketServer[] = [];

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      await server.close();
    }
    vi.useRealTimers();
  });

  function setup(connection: Partial<ConnectionSettings> = {}) {
    const created = createServer(connection);
    servers.push(created.server);
    return created;
  }

  test("registers attached sockets and answers pings", async () => {
    const { server, registry } = setup();
    const socket = new MockSocket();

    const connection = await server.attachSocket(socket, "127.0.0.1");
    socket.receive({ type: "ping" });

    expect(connection.getState()).toBe("connected");
    expect(registry.get(connection.id)).toBe(connection);
    expect(connection.id).toMatch(/^conn-[0-9a-f-]{36}$/);
    await vi.waitFor(() => {
      expect(socket.sentJson()).toEqual([{ type: "pong", status: "ok" }]);
    });
  });

  test("routes chat messages to the processor and writes the reply", async () => {
    const { server, processor } = setup();
    const socket = new MockSocket();
    await server.attachSocket(socket);

    socket.receive({ type: "message", provider: "OPENAI", prompt: "hi" });

    await vi.waitFor(() => {
      expect(socket.sentJson()).toEqual([
        {
          type: "message",
          status: "completed",
          response: "echo: hi",
          isMarkdown: false,
          provider: "OPENAI",
        },
      ]);
    });
    expect(processor.process).toHaveBeenCalledTimes(1);
  });

  test("forgets connections when the client goes away", async () => {
    const { server, registry } = setup();
    const socket = new MockSocket();
    const connection = await server.attachSocket(socket);

    socket.emit("close", 1001, Buffer.from("going away"));

    expect(registry.size).toBe(0);
    expect(connection.getState()).toBe("closed");
    expect(socket.listenerCount("message")).toBe(0);
  });

  test("closes sockets that stop answering pings", async () => {
    vi.useFakeTimers();
    const { server, registry } = setup({ pingIntervalMs: 1_000, pongTimeoutMs: 2_500 });
    const socket = new MockSocket();
    await server.attachSocket(socket);

    await vi.advanceTimersByTimeAsync(3_000);

    expect(socket.pings).toBe(2);
    expect(socket.closeCalls).toEqual([{ code: 4000, reason: "Pong timeout" }]);
    expect(registry.size).toBe(0);
  });

  test("protocol pongs keep a socket registered", async () => {
    vi.useFakeTimers();
    const { server, registry } = setup({ pingIntervalMs: 1_000, pongTimeoutMs: 2_500 });
    const socket = new MockSocket();
    await server.attachSocket(socket);

    await vi.advanceTimersByTimeAsync(2_000);
    socket.emit("pong", Buffer.alloc(0));
    await vi.advanceTimersByTimeAsync(2_000);

    expect(registry.size).toBe(1);
    expect(socket.closeCalls).toEqual([]);
  });

  test("socket errors after a server-side close are absorbed", async () => {
    const { server, registry } = setup();
    const socket = new MockSocket();
    const connection = await server.attachSocket(socket);

    connection.close(4000, "Pong timeout");

    expect(registry.size).toBe(0);
    expect(socket.listenerCount("message")).toBe(0);
    expect(socket.listenerCount("error")).toBe(1);
    expect(() => socket.emit("error", new RangeError("Max payload size exceeded"))).not.toThrow();
  });

  test("close shuts every connection down", async () => {
    const { server, registry } = createServer();
    const first = new MockSocket();
    const second = new MockSocket();
    await server.attachSocket(first);
    await server.attachSocket(second);

    await server.close();

    expect(registry.size).toBe(0);
    expect(first.closeCalls).toEqual([{ code: 1000, reason: "Server shutting down" }]);
    expect(second.closeCalls).toEqual([{ code: 1000, reason: "Server shutting down" }]);
  });
});

describe("ConnectionRegistry", () => {
  test("reports stats for every live connection", async () => {
    const { server, registry } = createServer();
    const connection = await server.attachSocket(new MockSocket());

    expect(registry.list()).toEqual([connection]);
    expect(registry.stats()).toEqual([
      expect.objectContaining({ id: connection.id, state: "connected", backlog: 0 }),
    ]);
    expect(registry.remove(connection.id)).toBe(true);
    expect(registry.remove(connection.id)).toBe(false);
    expect(registry.get(connection.id)).toBeUndefined();

    connection.close();
    await server.close();
  });
});
