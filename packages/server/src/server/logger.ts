import pino from "pino";
import {
  LogFormatSchema,
  LogLevelSchema,
  type PersistedConfig,
} from "./persisted-config.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const envLevel = LogLevelSchema.safeParse(env.CHATLINK_LOG);
  const envFormat = LogFormatSchema.safeParse(env.CHATLINK_LOG_FORMAT);

  const level: LogLevel =
    (envLevel.success ? envLevel.data : undefined) ?? persistedConfig?.log?.level ?? "info";
  const format: LogFormat =
    (envFormat.success ? envFormat.data : undefined) ?? persistedConfig?.log?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): pino.Logger {
  const config = resolveLogConfig(persistedConfig, env);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  return pino({
    level: config.level,
    transport,
  });
}

export function createChildLogger(parent: pino.Logger, module: string): pino.Logger {
  return parent.child({ module });
}
