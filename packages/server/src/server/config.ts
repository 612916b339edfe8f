import type { CircuitBreakerConfig } from "../shared/circuit-breaker.js";
import type { RetryPolicy } from "../shared/retry.js";
import type { PersistedConfig } from "./persisted-config.js";

export const DEFAULT_PORT = 8080;

export interface ConnectionSettings {
  pingIntervalMs: number;
  pongTimeoutMs: number;
  idleTimeoutMs: number | null;
  sendTimeoutMs: number;
  queueCapacity: number;
}

export interface RequestLimits {
  maxFileSizeBytes: number;
  maxTotalUploadBytes: number;
  maxFilesPerRequest: number;
  maxFrameBytes: number;
  requestTimeoutMs: number;
}

export interface ProviderSettings {
  apiKey: string | null;
  baseUrl: string;
  defaultModel: string | null;
}

export interface ChatDaemonConfig {
  host: string;
  port: number;
  staticDir: string | null;
  connection: ConnectionSettings;
  retry: RetryPolicy;
  circuitBreaker: Pick<CircuitBreakerConfig, "threshold" | "timeoutMs">;
  limits: RequestLimits;
  providers: {
    openai: ProviderSettings;
    claude: ProviderSettings;
  };
}

const MB = 1024 * 1024;

export const DEFAULT_DAEMON_CONFIG: ChatDaemonConfig = {
  host: "0.0.0.0",
  port: DEFAULT_PORT,
  staticDir: null,
  connection: {
    pingIntervalMs: 30_000,
    pongTimeoutMs: 120_000,
    idleTimeoutMs: 5 * 60_000,
    sendTimeoutMs: 5_000,
    queueCapacity: 256,
  },
  retry: {
    maxAttempts: 3,
    initialBackoffMs: 2_000,
    maxBackoffMs: 30_000,
  },
  circuitBreaker: {
    threshold: 5,
    timeoutMs: 60_000,
  },
  limits: {
    maxFileSizeBytes: 5 * MB,
    maxTotalUploadBytes: 50 * MB,
    maxFilesPerRequest: 50,
    maxFrameBytes: 1 * MB,
    requestTimeoutMs: 5 * 60_000,
  },
  providers: {
    openai: {
      apiKey: null,
      baseUrl: "https://api.openai.com/v1",
      defaultModel: null,
    },
    claude: {
      apiKey: null,
      baseUrl: "https://api.anthropic.com/v1/",
      defaultModel: null,
    },
  },
};

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function resolveChatlinkPort(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.CHATLINK_PORT ?? env.PORT;
  if (!raw) {
    return DEFAULT_PORT;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_PORT;
}

/**
 * Layers defaults, `config.json` and environment variables (highest wins).
 */
export function resolveDaemonConfig(
  persisted: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ChatDaemonConfig {
  const defaults = DEFAULT_DAEMON_CONFIG;
  const providers = persisted?.providers;

  return {
    host: nonEmpty(env.CHATLINK_HOST) ?? persisted?.server?.host ?? defaults.host,
    port: resolveChatlinkPort(env),
    staticDir: nonEmpty(env.CHATLINK_STATIC_DIR) ?? persisted?.server?.staticDir ?? null,
    connection: { ...defaults.connection, ...persisted?.connection },
    retry: { ...defaults.retry, ...persisted?.retry },
    circuitBreaker: { ...defaults.circuitBreaker, ...persisted?.circuitBreaker },
    limits: { ...defaults.limits, ...persisted?.limits },
    providers: {
      openai: {
        apiKey: nonEmpty(env.OPENAI_API_KEY) ?? providers?.openai?.apiKey ?? null,
        baseUrl: providers?.openai?.baseUrl ?? defaults.providers.openai.baseUrl,
        defaultModel: providers?.openai?.defaultModel ?? null,
      },
      claude: {
        apiKey:
          nonEmpty(env.CLAUDEAI_API_KEY) ??
          nonEmpty(env.ANTHROPIC_API_KEY) ??
          providers?.claude?.apiKey ??
          null,
        baseUrl: providers?.claude?.baseUrl ?? defaults.providers.claude.baseUrl,
        defaultModel: providers?.claude?.defaultModel ?? null,
      },
    },
  };
}
