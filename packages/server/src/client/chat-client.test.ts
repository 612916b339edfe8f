import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { Logger } from "../shared/logger.js";
import type { ChannelTransport } from "../shared/transport.js";
import { createFakeTransport, type FakeTransport } from "../test-utils/fake-transport.js";
import {
  ChatClient,
  RELOAD_REQUIRED_MESSAGE,
  type ChatClientConfig,
  type ChatClientEvent,
} from "./chat-client.js";

function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const flush = () => vi.advanceTimersByTimeAsync(0);

function createClient(fake: FakeTransport, overrides: Partial<ChatClientConfig> = {}) {
  const logger = createMockLogger();
  const client = new ChatClient({
    url: "ws://localhost:8080/ws",
    connector: async () => fake.transport,
    logger,
    ...overrides,
  });
  const events: ChatClientEvent[] = [];
  client.subscribe((event) => events.push(event));
  return { client, events, logger };
}

describe("ChatClient", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("reports status changes while connecting", async () => {
    const fake = createFakeTransport();
    const { client, events } = createClient(fake);

    await expect(client.connect()).resolves.toBe(true);

    expect(events).toEqual([
      { type: "status", state: "connecting", connected: false },
      { type: "status", state: "connected", connected: true },
    ]);
    expect(client.isConnected).toBe(true);
    client.close();
  });

  test("refuses to send without a provider", async () => {
    const fake = createFakeTransport();
    const { client } = createClient(fake);
    await client.connect();

    await expect(client.sendMessage({ provider: "  ", prompt: "hi" })).resolves.toEqual({
      status: "rejected",
      reason: "Select an LLM provider before sending.",
    });
    await flush();

    expect(fake.attempted).toEqual([]);
    client.close();
  });

  test("queues messages while offline and sends them once connected", async () => {
    const fake = createFakeTransport();
    const { client } = createClient(fake);
    const expected =
      '{"type":"message","provider":"OPENAI","model":"gpt-4o","prompt":"hi","history":[],"files":[]}';

    await expect(
      client.sendMessage({ provider: "OPENAI", model: "gpt-4o", prompt: "hi" })
    ).resolves.toEqual({ status: "queued", reason: "Not connected" });
    expect(client.pendingMessages()).toEqual([expected]);

    await client.connect();
    await flush();

    expect(fake.sent).toEqual([expected]);
    expect(client.pendingMessages()).toEqual([]);
    client.close();
  });

  test("emits responses and progress updates", async () => {
    const fake = createFakeTransport();
    const { client, events } = createClient(fake);
    await client.connect();
    events.length = 0;

    fake.emitMessage(
      JSON.stringify({
        type: "progress",
        status: "processing",
        message: "Processing file 1 of 2: notes.txt",
        current: 1,
        total: 2,
        percentage: 50,
      })
    );
    fake.emitMessage(
      JSON.stringify({
        type: "message",
        status: "completed",
        response: "hello",
        isMarkdown: false,
        provider: "OPENAI",
      })
    );
    fake.emitMessage(JSON.stringify({ type: "error", status: "error", response: "boom" }));

    expect(events).toEqual([
      {
        type: "progress",
        progress: {
          type: "progress",
          status: "processing",
          message: "Processing file 1 of 2: notes.txt",
          current: 1,
          total: 2,
          percentage: 50,
        },
      },
      {
        type: "response",
        response: {
          type: "message",
          status: "completed",
          response: "hello",
          isMarkdown: false,
          provider: "OPENAI",
        },
      },
      { type: "response", response: { type: "error", status: "error", response: "boom" } },
    ]);
    client.close();
  });

  test("drops frames it cannot parse", async () => {
    const fake = createFakeTransport();
    const { client, events, logger } = createClient(fake);
    await client.connect();
    events.length = 0;

    fake.emitMessage("not json");
    fake.emitMessage('{"type":"message"}');

    expect(events).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    client.close();
  });

  test("asks for a reload once reconnects are exhausted", async () => {
    const fake = createFakeTransport();
    const connector = vi.fn(async (): Promise<ChannelTransport> => {
      throw new Error("connection refused");
    });
    const { client, events } = createClient(fake, {
      connector,
      reconnect: { maxAttempts: 2, initialBackoffMs: 1_000 },
    });

    await client.connect();
    await vi.advanceTimersByTimeAsync(1_000);
    await vi.advanceTimersByTimeAsync(2_000);

    expect(connector).toHaveBeenCalledTimes(3);
    expect(events.filter((event) => event.type === "reconnecting")).toEqual([
      { type: "reconnecting", attempt: 1, maxAttempts: 2, delayMs: 1_000 },
      { type: "reconnecting", attempt: 2, maxAttempts: 2, delayMs: 2_000 },
    ]);
    expect(events.at(-1)).toEqual({ type: "failed", attempts: 2, message: RELOAD_REQUIRED_MESSAGE });
    expect(client.getState()).toBe("failed");
  });

  test("pings every 30 seconds and stays up while pongs arrive", async () => {
    const fake = createFakeTransport();
    const { client } = createClient(fake);
    await client.connect();

    await vi.advanceTimersByTimeAsync(30_000);
    expect(fake.pings).toBe(1);

    fake.emitMessage('{"type":"pong","status":"ok"}');
    await vi.advanceTimersByTimeAsync(60_000);

    expect(fake.pings).toBe(3);
    expect(client.getState()).toBe("connected");
    client.close();
  });

  test("rejects sends after close", async () => {
    const fake = createFakeTransport();
    const { client } = createClient(fake);
    await client.connect();

    client.close();

    expect(client.getState()).toBe("closed");
    await expect(client.sendMessage({ provider: "OPENAI", prompt: "hi" })).resolves.toEqual({
      status: "rejected",
      reason: "Connection closed",
    });
  });
});
