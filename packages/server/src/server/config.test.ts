import { describe, expect, test } from "vitest";
import { DEFAULT_DAEMON_CONFIG, resolveChatlinkPort, resolveDaemonConfig } from "./config.js";

describe("resolveChatlinkPort", () => {
  test("reads CHATLINK_PORT, then PORT, then the default", () => {
    expect(resolveChatlinkPort({ CHATLINK_PORT: "9000", PORT: "7000" })).toBe(9000);
    expect(resolveChatlinkPort({ PORT: "7000" })).toBe(7000);
    expect(resolveChatlinkPort({})).toBe(8080);
    expect(resolveChatlinkPort({ CHATLINK_PORT: "not-a-port" })).toBe(8080);
  });
});

describe("resolveDaemonConfig", () => {
  test("uses defaults without a config file or environment", () => {
    expect(resolveDaemonConfig(undefined, {})).toEqual(DEFAULT_DAEMON_CONFIG);
  });

  test("merges config file sections over the defaults", () => {
    const config = resolveDaemonConfig(
      {
        server: { host: "127.0.0.1" },
        connection: { pingIntervalMs: 10_000, idleTimeoutMs: null },
        retry: { maxAttempts: 5 },
        limits: { maxFilesPerRequest: 10 },
      },
      {}
    );

    expect(config.host).toBe("127.0.0.1");
    expect(config.connection).toEqual({
      ...DEFAULT_DAEMON_CONFIG.connection,
      pingIntervalMs: 10_000,
      idleTimeoutMs: null,
    });
    expect(config.retry).toEqual({ maxAttempts: 5, initialBackoffMs: 2_000, maxBackoffMs: 30_000 });
    expect(config.limits.maxFilesPerRequest).toBe(10);
    expect(config.limits.maxFileSizeBytes).toBe(5 * 1024 * 1024);
  });

  test("environment variables win over the config file", () => {
    const config = resolveDaemonConfig(
      {
        server: { host: "127.0.0.1", staticDir: "/srv/public" },
        providers: { openai: { apiKey: "file-key" } },
      },
      {
        CHATLINK_HOST: "0.0.0.0",
        CHATLINK_STATIC_DIR: "./public",
        OPENAI_API_KEY: "test-openai-key",
      }
    );

    expect(config.host).toBe("0.0.0.0");
    expect(config.staticDir).toBe("./public");
    expect(config.providers.openai.apiKey).toBe("test-openai-key");
  });

  test("reads the Claude key from either variable", () => {
    expect(resolveDaemonConfig(undefined, { CLAUDEAI_API_KEY: "test-claude-key" }).providers.claude.apiKey).toBe(
      "test-claude-key"
    );
    expect(resolveDaemonConfig(undefined, { ANTHROPIC_API_KEY: "test-anthropic-key" }).providers.claude.apiKey).toBe(
      "test-anthropic-key"
    );
    expect(resolveDaemonConfig(undefined, { OPENAI_API_KEY: "  " }).providers.openai.apiKey).toBeNull();
  });

  test("keeps provider endpoints and default models from the config file", () => {
    const config = resolveDaemonConfig(
      {
        providers: {
          claude: { apiKey: "test-claude-key", baseUrl: "http://localhost:4000/v1/", defaultModel: "claude-sonnet-4-20250514" },
        },
      },
      {}
    );

    expect(config.providers.claude).toEqual({
      apiKey: "test-claude-key",
      baseUrl: "http://localhost:4000/v1/",
      defaultModel: "claude-sonnet-4-20250514",
    });
  });
});
