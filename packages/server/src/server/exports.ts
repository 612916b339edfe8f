// Library exports for @chatlink/server
export { createChatDaemon, type ChatDaemon, type ChatDaemonDeps } from "./bootstrap.js";
export {
  DEFAULT_DAEMON_CONFIG,
  resolveChatlinkPort,
  resolveDaemonConfig,
  type ChatDaemonConfig,
  type ConnectionSettings,
  type ProviderSettings,
  type RequestLimits,
} from "./config.js";
export { createRootLogger, createChildLogger, resolveLogConfig, type LogLevel, type LogFormat } from "./logger.js";
export {
  loadPersistedConfig,
  resolveConfigHome,
  type PersistedConfig,
} from "./persisted-config.js";
export { ConnectionRegistry } from "./connection-registry.js";
export { ChatWebSocketServer, WS_PATH } from "./websocket-server.js";
export { MessageProtocolHandler } from "./protocol-handler.js";
export { ChatRequestProcessor, detectMarkdown } from "./request-processor.js";
export { BasicFileProcessor, type FileProcessor, type ProcessedFile } from "./file-processor.js";
export { LLMManager, type ProviderSummary } from "./llm/llm-manager.js";
export { OpenAICompatibleClient } from "./llm/openai-compatible-client.js";
export type { LLMClient, LLMPromptRequest } from "./llm/llm-client.js";
export * from "./llm/model-catalog.js";
