import type { Server as HTTPServer } from "node:http";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer } from "ws";
import { CircuitBreaker, type CircuitBreakerConfig } from "../shared/circuit-breaker.js";
import { ManagedConnection } from "../shared/managed-connection.js";
import {
  CloseCode,
  createNodeSocketTransport,
  type NodeSocketLike,
} from "../shared/transport.js";
import type { ConnectionSettings } from "./config.js";
import type { ConnectionRegistry } from "./connection-registry.js";
import { MessageProtocolHandler, type ChatRequestHandler } from "./protocol-handler.js";

export const WS_PATH = "/ws";

export interface ChatWebSocketServerOptions {
  /** Without a server the instance only accepts sockets through `attachSocket`. */
  server?: HTTPServer;
  registry: ConnectionRegistry;
  processor: ChatRequestHandler;
  connection: ConnectionSettings;
  circuitBreaker: Pick<CircuitBreakerConfig, "threshold" | "timeoutMs">;
  maxFilesPerRequest: number;
  maxFrameBytes: number;
  logger: Logger;
  now?: () => number;
}

/**
 * Accepts chat sockets on `/ws` and gives each one a managed connection with
 * reconnect disabled plus its own protocol handler.
 */
export class ChatWebSocketServer {
  private readonly wss: WebSocketServer;
  private readonly logger: Logger;

  constructor(private readonly options: ChatWebSocketServerOptions) {
    this.logger = options.logger.child({ module: "websocket-server" });
    this.wss = options.server
      ? new WebSocketServer({
          server: options.server,
          path: WS_PATH,
          maxPayload: options.maxFrameBytes,
        })
      : new WebSocketServer({ noServer: true, maxPayload: options.maxFrameBytes });

    this.wss.on("connection", (ws, request) => {
      this.attachSocket(ws, request.socket.remoteAddress).catch((error: unknown) => {
        this.logger.error({ err: error }, "Failed to attach socket");
        ws.close(CloseCode.Normal, "Internal error");
      });
    });
  }

  async attachSocket(socket: NodeSocketLike, remoteAddress?: string): Promise<ManagedConnection> {
    const id = `conn-${uuidv4()}`;
    const { registry, connection: settings } = this.options;
    const logger = this.logger.child({ connectionId: id });
    const transport = createNodeSocketTransport(socket);
    // Stays attached for the socket's lifetime: `ws` keeps reading during the
    // closing handshake, after the session has dropped its own listeners.
    socket.on("error", (error) => {
      logger.debug({ err: error }, "Socket error");
    });

    const connection = new ManagedConnection({
      id,
      connector: async () => transport,
      logger,
      reconnect: { enabled: false },
      heartbeat: {
        pingIntervalMs: settings.pingIntervalMs,
        pongTimeoutMs: settings.pongTimeoutMs,
        idleTimeoutMs: settings.idleTimeoutMs,
      },
      queue: {
        capacity: settings.queueCapacity,
        sendTimeoutMs: settings.sendTimeoutMs,
      },
      circuitBreaker: new CircuitBreaker(this.options.circuitBreaker, this.options.now),
      now: this.options.now,
    });
    const handler = new MessageProtocolHandler({
      peer: connection,
      processor: this.options.processor,
      maxFilesPerRequest: this.options.maxFilesPerRequest,
      logger,
    });

    connection.subscribe((event) => {
      switch (event.type) {
        case "message":
          handler.handleFrame(event.data);
          return;
        case "closed":
          registry.remove(id);
          logger.info(
            { code: event.code, reason: event.reason, total: registry.size },
            "Client disconnected"
          );
          return;
        default:
          return;
      }
    });

    registry.add(connection);
    await connection.connect();
    logger.info({ remoteAddress, total: registry.size }, "Client connected");
    return connection;
  }

  async close(): Promise<void> {
    this.options.registry.closeAll(CloseCode.Normal, "Server shutting down");
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
