import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);
export const LogFormatSchema = z.enum(["pretty", "json"]);

const LogConfigSchema = z
  .object({
    level: LogLevelSchema.optional(),
    format: LogFormatSchema.optional(),
  })
  .strict();

const ServerConfigSchema = z
  .object({
    host: z.string().min(1).optional(),
    staticDir: z.string().min(1).optional(),
  })
  .strict();

const positiveInt = () => z.number().int().positive();

const ConnectionConfigSchema = z
  .object({
    pingIntervalMs: positiveInt().optional(),
    pongTimeoutMs: positiveInt().optional(),
    idleTimeoutMs: positiveInt().nullable().optional(),
    sendTimeoutMs: positiveInt().optional(),
    queueCapacity: positiveInt().optional(),
  })
  .strict();

const RetryConfigSchema = z
  .object({
    maxAttempts: positiveInt().optional(),
    initialBackoffMs: positiveInt().optional(),
    maxBackoffMs: positiveInt().optional(),
  })
  .strict();

const CircuitBreakerConfigSchema = z
  .object({
    threshold: positiveInt().optional(),
    timeoutMs: positiveInt().optional(),
  })
  .strict();

const LimitsConfigSchema = z
  .object({
    maxFileSizeBytes: positiveInt().optional(),
    maxTotalUploadBytes: positiveInt().optional(),
    maxFilesPerRequest: positiveInt().optional(),
    maxFrameBytes: positiveInt().optional(),
    requestTimeoutMs: positiveInt().optional(),
  })
  .strict();

const ProviderCredentialsSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    defaultModel: z.string().min(1).optional(),
  })
  .strict();

const ProvidersSchema = z
  .object({
    openai: ProviderCredentialsSchema.optional(),
    claude: ProviderCredentialsSchema.optional(),
  })
  .strict();

export const PersistedConfigSchema = z
  .object({
    $schema: z.string().optional(),
    log: LogConfigSchema.optional(),
    server: ServerConfigSchema.optional(),
    connection: ConnectionConfigSchema.optional(),
    retry: RetryConfigSchema.optional(),
    circuitBreaker: CircuitBreakerConfigSchema.optional(),
    limits: LimitsConfigSchema.optional(),
    providers: ProvidersSchema.optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

type LoggerLike = {
  child(bindings: Record<string, unknown>): LoggerLike;
  info(msg: string): void;
};

function getLogger(logger: LoggerLike | undefined): LoggerLike | undefined {
  return logger?.child({ module: "config" });
}

const CONFIG_FILENAME = "config.json";

export const DEFAULT_PERSISTED_CONFIG: PersistedConfig = {
  log: {
    level: "info",
    format: "pretty",
  },
};

/**
 * Directory holding `config.json`: `CHATLINK_HOME` (a leading `~` expands to
 * the user's home), else `~/.chatlink`.
 */
export function resolveConfigHome(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.CHATLINK_HOME?.trim();
  if (!configured) {
    return path.join(os.homedir(), ".chatlink");
  }
  return path.resolve(configured.replace(/^~(?=$|\/)/, os.homedir()));
}

export function getConfigPath(chatlinkHome: string): string {
  return path.join(chatlinkHome, CONFIG_FILENAME);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
}

export function parsePersistedConfig(raw: unknown, source: string): PersistedConfig {
  const result = PersistedConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`[Config] Invalid config in ${source}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadPersistedConfig(chatlinkHome: string, logger?: LoggerLike): PersistedConfig {
  const log = getLogger(logger);
  const configPath = getConfigPath(chatlinkHome);

  if (!existsSync(configPath)) {
    try {
      mkdirSync(path.dirname(configPath), { recursive: true });
      writeFileSync(configPath, JSON.stringify(DEFAULT_PERSISTED_CONFIG, null, 2) + "\n");
      log?.info(`Initialized config file at ${configPath}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`[Config] Failed to initialize ${configPath}: ${message}`);
    }
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Failed to read ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Invalid JSON in ${configPath}: ${message}`);
  }

  const config = parsePersistedConfig(parsed, configPath);
  log?.info(`Loaded from ${configPath}`);
  return config;
}
