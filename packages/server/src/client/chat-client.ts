import WebSocket from "ws";
import { consoleLogger, type Logger } from "../shared/logger.js";
import {
  ManagedConnection,
  type ConnectionEvent,
  type ConnectionState,
  type HeartbeatConfig,
  type OutboundQueueConfig,
  type ReconnectPolicy,
  type SendOutcome,
} from "../shared/managed-connection.js";
import {
  WSOutboundMessageSchema,
  formatZodIssues,
  hasRoutingField,
  type ChatMessageInput,
  type CompletedResponse,
  type ErrorResponse,
  type ProgressResponse,
} from "../shared/messages.js";
import {
  openWebSocketTransport,
  type TransportConnector,
  type WebSocketFactory,
} from "../shared/transport.js";

export const RELOAD_REQUIRED_MESSAGE =
  "Connection to the server was lost. Reload the page to reconnect.";

export type ChatClientEvent =
  | { type: "status"; state: ConnectionState; connected: boolean; reason?: string }
  | { type: "response"; response: CompletedResponse | ErrorResponse }
  | { type: "progress"; progress: ProgressResponse }
  | { type: "reconnecting"; attempt: number; maxAttempts: number; delayMs: number }
  | { type: "failed"; attempts: number; message: string };

export type ChatClientEventHandler = (event: ChatClientEvent) => void;

export type ChatClientConfig = {
  url: string;
  headers?: Record<string, string>;
  webSocketFactory?: WebSocketFactory;
  /** Replaces the WebSocket connector entirely. */
  connector?: TransportConnector;
  logger?: Logger;
  reconnect?: Partial<Omit<ReconnectPolicy, "enabled">>;
  heartbeat?: Partial<Pick<HeartbeatConfig, "pingIntervalMs" | "pongTimeoutMs">>;
  queue?: Partial<OutboundQueueConfig>;
  handshakeTimeoutMs?: number;
  now?: () => number;
};

export const CLIENT_HEARTBEAT: Pick<HeartbeatConfig, "pingIntervalMs" | "pongTimeoutMs"> = {
  pingIntervalMs: 30_000,
  pongTimeoutMs: 60_000,
};

const defaultWebSocketFactory: WebSocketFactory = (url, options) =>
  new WebSocket(url, { headers: options?.headers });

/**
 * Chat client over a reconnecting managed connection. Messages sent while
 * offline wait in the retry backlog and go out in order once reconnected.
 */
export class ChatClient {
  private readonly connection: ManagedConnection;
  private readonly logger: Logger;
  private readonly listeners = new Set<ChatClientEventHandler>();

  constructor(config: ChatClientConfig) {
    this.logger = config.logger ?? consoleLogger;
    const factory = config.webSocketFactory ?? defaultWebSocketFactory;
    const connector =
      config.connector ??
      (() =>
        openWebSocketTransport({
          url: config.url,
          factory,
          headers: config.headers,
          handshakeTimeoutMs: config.handshakeTimeoutMs ?? 15_000,
        }));

    this.connection = new ManagedConnection({
      id: config.url,
      connector,
      logger: this.logger,
      reconnect: { ...config.reconnect, enabled: true },
      heartbeat: { ...CLIENT_HEARTBEAT, ...config.heartbeat, idleTimeoutMs: null },
      queue: config.queue,
      isRoutable: hasRoutingField,
      now: config.now,
    });
    this.connection.subscribe((event) => this.handleConnectionEvent(event));
  }

  connect(): Promise<boolean> {
    return this.connection.connect();
  }

  close(): void {
    this.connection.close();
  }

  getState(): ConnectionState {
    return this.connection.getState();
  }

  get isConnected(): boolean {
    return this.connection.isConnected;
  }

  /** Serialized envelopes still waiting for a live connection. */
  pendingMessages(): string[] {
    return this.connection.pendingMessages();
  }

  subscribe(handler: ChatClientEventHandler): () => void {
    this.listeners.add(handler);
    return () => {
      this.listeners.delete(handler);
    };
  }

  async sendMessage(input: ChatMessageInput): Promise<SendOutcome> {
    const provider = input.provider?.trim() ?? "";
    if (!provider) {
      this.logger.warn({}, "Refusing to send a message without a provider");
      return { status: "rejected", reason: "Select an LLM provider before sending." };
    }
    const envelope = {
      type: "message" as const,
      provider,
      model: input.model ?? "",
      prompt: input.prompt ?? "",
      history: input.history ?? [],
      files: input.files ?? [],
    };
    const outcome = await this.connection.send(envelope);
    if (outcome.status === "queued") {
      this.logger.info({ reason: outcome.reason }, "Message queued until the connection recovers");
    }
    return outcome;
  }

  private handleConnectionEvent(event: ConnectionEvent): void {
    switch (event.type) {
      case "state":
        this.emit({
          type: "status",
          state: event.state,
          connected: event.state === "connected",
          ...(event.reason ? { reason: event.reason } : {}),
        });
        return;
      case "message":
        this.handleFrame(event.data);
        return;
      case "reconnecting":
        this.emit({
          type: "reconnecting",
          attempt: event.attempt,
          maxAttempts: event.maxAttempts,
          delayMs: event.delayMs,
        });
        return;
      case "failed":
        this.emit({ type: "failed", attempts: event.attempts, message: RELOAD_REQUIRED_MESSAGE });
        return;
      case "closed":
        return;
    }
  }

  private handleFrame(data: string): void {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      this.logger.warn({ err: error }, "Dropping frame that is not JSON");
      return;
    }
    const parsed = WSOutboundMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ issues: formatZodIssues(parsed.error) }, "Dropping invalid frame");
      return;
    }
    const message = parsed.data;
    switch (message.type) {
      case "pong":
        this.connection.notePong();
        return;
      case "progress":
        this.emit({ type: "progress", progress: message });
        return;
      case "message":
      case "error":
        this.emit({ type: "response", response: message });
        return;
    }
  }

  private emit(event: ChatClientEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, "Chat client listener threw");
      }
    }
  }
}
