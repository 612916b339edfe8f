import { describe, expect, test } from "vitest";
import {
  WSInboundMessageSchema,
  WSOutboundMessageSchema,
  completedResponse,
  formatZodIssues,
  hasRoutingField,
  progressResponse,
} from "./messages.js";

describe("WSInboundMessageSchema", () => {
  test("fills defaults for a minimal chat message", () => {
    const parsed = WSInboundMessageSchema.parse({ type: "message", provider: "OPENAI" });

    expect(parsed).toEqual({
      type: "message",
      provider: "OPENAI",
      model: "",
      prompt: "",
      history: [],
      files: [],
    });
  });

  test("treats frames without a type as chat messages", () => {
    const parsed = WSInboundMessageSchema.parse({ provider: "CLAUDE", prompt: "hi", history: null });

    expect(parsed.type).toBe("message");
  });

  test("accepts ping and pong envelopes", () => {
    expect(WSInboundMessageSchema.parse({ type: "ping" })).toEqual({ type: "ping" });
    expect(WSInboundMessageSchema.parse({ type: "pong", status: "ok" })).toEqual({
      type: "pong",
      status: "ok",
    });
  });

  test("defaults file fields", () => {
    const parsed = WSInboundMessageSchema.parse({
      type: "message",
      provider: "OPENAI",
      files: [{ name: "notes.txt", content: "hello" }],
    });

    expect(parsed.type === "message" && parsed.files).toEqual([
      {
        name: "notes.txt",
        content: "hello",
        contentType: "",
        fileType: "",
        size: 0,
        isBase64: false,
      },
    ]);
  });

  test("reports the offending path", () => {
    const result = WSInboundMessageSchema.safeParse({ type: "message", provider: 42 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe("provider: Expected string, received number");
    }
  });

  test("rejects history entries with an unknown role", () => {
    const result = WSInboundMessageSchema.safeParse({
      type: "message",
      provider: "OPENAI",
      history: [{ role: "system", content: "x" }],
    });

    expect(result.success).toBe(false);
  });
});

describe("WSOutboundMessageSchema", () => {
  test("round-trips the builders", () => {
    const completed = completedResponse("hello", "OPENAI", false);
    const progress = progressResponse("Building file context...", 2, 2, 100);

    expect(WSOutboundMessageSchema.parse(completed)).toEqual({
      type: "message",
      status: "completed",
      response: "hello",
      isMarkdown: false,
      provider: "OPENAI",
    });
    expect(WSOutboundMessageSchema.parse(progress)).toEqual({
      type: "progress",
      status: "processing",
      message: "Building file context...",
      current: 2,
      total: 2,
      percentage: 100,
    });
  });
});

describe("hasRoutingField", () => {
  test("requires a provider on chat messages only", () => {
    expect(hasRoutingField({ type: "message", provider: "OPENAI" })).toBe(true);
    expect(hasRoutingField({ provider: "CLAUDE" })).toBe(true);
    expect(hasRoutingField({ type: "message", provider: "  " })).toBe(false);
    expect(hasRoutingField({ type: "message" })).toBe(false);
    expect(hasRoutingField({ type: "ping" })).toBe(true);
    expect(hasRoutingField(null)).toBe(false);
    expect(hasRoutingField("message")).toBe(false);
  });
});
