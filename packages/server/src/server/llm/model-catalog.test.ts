import { describe, expect, test } from "vitest";
import {
  CLAUDE_SONNET_4,
  FALLBACK_MAX_TOKENS,
  getMaxTokens,
  isProviderId,
  listModels,
  normalizeProviderId,
  resolveModel,
} from "./model-catalog.js";

describe("model catalog", () => {
  test("normalizes provider ids", () => {
    expect(normalizeProviderId(" openai ")).toBe("OPENAI");
    expect(isProviderId("CLAUDE")).toBe(true);
    expect(isProviderId("claude")).toBe(false);
    expect(isProviderId("GEMINI")).toBe(false);
  });

  test("resolves models case-insensitively within a provider", () => {
    expect(resolveModel("claude", "Claude-Sonnet-4-20250514")?.id).toBe(CLAUDE_SONNET_4);
    expect(resolveModel("OPENAI", CLAUDE_SONNET_4)).toBeNull();
  });

  test("falls back to the default token limit for unknown models", () => {
    expect(getMaxTokens("OPENAI", "gpt-4o")).toBe(4096);
    expect(getMaxTokens("OPENAI", "gpt-unknown")).toBe(FALLBACK_MAX_TOKENS);
  });

  test("lists the models of one provider", () => {
    expect(listModels("CLAUDE").map((model) => model.label)).toEqual([
      "Claude Sonnet 4",
      "Claude Sonnet 4.5",
    ]);
  });
});
