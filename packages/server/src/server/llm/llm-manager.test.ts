import pino from "pino";
import { describe, expect, test, vi } from "vitest";
import { UnknownProviderError } from "../../shared/errors.js";
import { FakeLLMClient } from "../test-utils/fake-llm-client.js";
import { LLMManager, type ClientFactoryInput, type ProviderSettingsMap } from "./llm-manager.js";
import { CLAUDE_SONNET_4, CLAUDE_SONNET_4_5 } from "./model-catalog.js";

const logger = pino({ level: "silent" });

function createProviders(overrides: Partial<ProviderSettingsMap> = {}): ProviderSettingsMap {
  return {
    openai: { apiKey: "test-openai-key", baseUrl: "https://api.openai.com/v1", defaultModel: null },
    claude: { apiKey: null, baseUrl: "https://api.anthropic.com/v1/", defaultModel: null },
    ...overrides,
  };
}

function createManager(providers: ProviderSettingsMap) {
  const factory = vi.fn(
    (input: ClientFactoryInput) => new FakeLLMClient(input.provider, input.model, ["ok"])
  );
  return { manager: new LLMManager(providers, logger, factory), factory };
}

const claudeConfigured = {
  claude: { apiKey: "test-claude-key", baseUrl: "https://api.anthropic.com/v1/", defaultModel: null },
};

describe("LLMManager", () => {
  test("builds an OpenAI client with the default model", () => {
    const { manager, factory } = createManager(createProviders());

    const client = manager.getClient("openai", "");

    expect(client.provider).toBe("OPENAI");
    expect(client.model).toBe("gpt-4o");
    expect(factory).toHaveBeenCalledWith({
      provider: "OPENAI",
      model: "gpt-4o",
      apiKey: "test-openai-key",
      baseUrl: "https://api.openai.com/v1",
      logger: expect.anything(),
    });
  });

  test("reuses clients per provider and model", () => {
    const { manager, factory } = createManager(createProviders());

    const first = manager.getClient("OPENAI", "gpt-4o");
    const second = manager.getClient(" openai ", "gpt-4o");

    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  test("rejects providers without credentials", () => {
    const { manager } = createManager(createProviders());

    expect(() => manager.getClient("CLAUDE", "")).toThrow(UnknownProviderError);
    expect(() => manager.getClient("CLAUDE", "")).toThrow(
      "LLM provider 'CLAUDE' is not supported or not configured. Available providers: OPENAI"
    );
  });

  test("rejects unknown providers", () => {
    const { manager } = createManager(createProviders());

    expect(() => manager.getClient("gemini", "")).toThrow(
      "LLM provider 'gemini' is not supported or not configured. Available providers: OPENAI"
    );
  });

  test("maps Claude model requests onto supported models", () => {
    const { manager } = createManager(createProviders(claudeConfigured));

    expect(manager.getClient("CLAUDE", "").model).toBe(CLAUDE_SONNET_4_5);
    expect(manager.getClient("CLAUDE", "claude-sonnet-4-20250514").model).toBe(CLAUDE_SONNET_4);
    expect(manager.getClient("CLAUDE", "claude-2.1").model).toBe(CLAUDE_SONNET_4_5);
  });

  test("prefers the configured default model", () => {
    const { manager } = createManager(
      createProviders({
        openai: {
          apiKey: "test-openai-key",
          baseUrl: "https://api.openai.com/v1",
          defaultModel: "gpt-4o-mini",
        },
      })
    );

    expect(manager.getClient("OPENAI", "").model).toBe("gpt-4o-mini");
    expect(manager.getClient("OPENAI", "gpt-4o").model).toBe("gpt-4o");
  });

  test("lists configured providers with their models", () => {
    const { manager } = createManager(createProviders(claudeConfigured));

    expect(manager.availableProviders()).toEqual(["OPENAI", "CLAUDE"]);
    expect(manager.listProviders()).toEqual([
      {
        id: "OPENAI",
        defaultModel: "gpt-4o",
        models: [{ id: "gpt-4o", label: "GPT-4o", maxTokens: 4096 }],
      },
      {
        id: "CLAUDE",
        defaultModel: CLAUDE_SONNET_4_5,
        models: [
          { id: CLAUDE_SONNET_4, label: "Claude Sonnet 4", maxTokens: 4096 },
          { id: CLAUDE_SONNET_4_5, label: "Claude Sonnet 4.5", maxTokens: 4096 },
        ],
      },
    ]);
  });
});
