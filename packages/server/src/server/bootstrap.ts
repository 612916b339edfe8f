import express, { type Express } from "express";
import { createServer as createHTTPServer, type Server as HTTPServer } from "node:http";
import type { Logger } from "pino";
import { CircuitBreakerRegistry } from "../shared/circuit-breaker.js";
import type { Sleep } from "../shared/retry.js";
import type { ChatDaemonConfig } from "./config.js";
import { ConnectionRegistry } from "./connection-registry.js";
import { BasicFileProcessor, type FileProcessor } from "./file-processor.js";
import type { LLMClientResolver } from "./llm/llm-client.js";
import { LLMManager, type ProviderSummary } from "./llm/llm-manager.js";
import { ChatRequestProcessor } from "./request-processor.js";
import { ChatWebSocketServer, WS_PATH } from "./websocket-server.js";

export type ChatDaemonDeps = {
  logger: Logger;
  /** Overrides the provider clients built from `config.providers`. */
  llm?: LLMClientResolver & { listProviders(): ProviderSummary[] };
  fileProcessor?: FileProcessor;
  sleep?: Sleep;
};

export type ChatDaemon = {
  app: Express;
  httpServer: HTTPServer;
  wsServer: ChatWebSocketServer;
  registry: ConnectionRegistry;
  breakers: CircuitBreakerRegistry;
  start: () => Promise<{ port: number }>;
  close: () => Promise<void>;
};

export function createChatDaemon(config: ChatDaemonConfig, deps: ChatDaemonDeps): ChatDaemon {
  const logger = deps.logger;
  const llm = deps.llm ?? new LLMManager(config.providers, logger);
  const breakers = new CircuitBreakerRegistry(config.circuitBreaker);
  const registry = new ConnectionRegistry();

  if (llm.listProviders().length === 0) {
    logger.warn("No LLM provider is configured. Set OPENAI_API_KEY or CLAUDEAI_API_KEY");
  }

  const app = express();
  if (config.staticDir) {
    app.use(express.static(config.staticDir));
  }
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      connections: registry.size,
    });
  });

  app.get("/api/providers", (_req, res) => {
    res.json({ providers: llm.listProviders() });
  });

  app.get("/api/circuits", (_req, res) => {
    res.json({
      circuits: breakers.entries().map(([name, snapshot]) => ({ name, ...snapshot })),
    });
  });

  const httpServer = createHTTPServer(app);

  const processor = new ChatRequestProcessor({
    llm,
    fileProcessor: deps.fileProcessor ?? new BasicFileProcessor(),
    breakers,
    retry: config.retry,
    limits: config.limits,
    logger,
    sleep: deps.sleep,
  });

  const wsServer = new ChatWebSocketServer({
    server: httpServer,
    registry,
    processor,
    connection: config.connection,
    circuitBreaker: config.circuitBreaker,
    maxFilesPerRequest: config.limits.maxFilesPerRequest,
    maxFrameBytes: config.limits.maxFrameBytes,
    logger,
  });

  const start = () =>
    new Promise<{ port: number }>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(config.port, config.host, () => {
        httpServer.off("error", reject);
        const address = httpServer.address();
        const port = address && typeof address === "object" ? address.port : config.port;
        logger.info({ host: config.host, port, wsPath: WS_PATH }, "Server listening");
        resolve({ port });
      });
    });

  const close = async () => {
    await wsServer.close();
    if (!httpServer.listening) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };

  return {
    app,
    httpServer,
    wsServer,
    registry,
    breakers,
    start,
    close,
  };
}
