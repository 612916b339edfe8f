import { computeBackoffDelay, type BackoffConfig } from "./backoff.js";
import { CircuitBreaker, type CircuitBreakerSnapshot } from "./circuit-breaker.js";
import { describeError } from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";
import { BoundedQueue, RetryQueue, type QueuedMessage } from "./message-queue.js";
import { TaskGroup } from "./task-group.js";
import {
  CloseCode,
  describeTransportClose,
  type ChannelTransport,
  type TransportCloseEvent,
  type TransportConnector,
} from "./transport.js";

export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "reconnecting"
  | "closed"
  | "failed";

export interface ReconnectPolicy extends BackoffConfig {
  /** The passive (server) side never reconnects. */
  enabled: boolean;
  maxAttempts: number;
}

export interface HeartbeatConfig {
  pingIntervalMs: number;
  pongTimeoutMs: number;
  /** Close the connection after this long without an inbound frame. */
  idleTimeoutMs: number | null;
}

export interface OutboundQueueConfig {
  capacity: number;
  /** How long `send` waits for room in a full outbound queue. */
  sendTimeoutMs: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  enabled: true,
  maxAttempts: 10,
  initialBackoffMs: 1_000,
  maxBackoffMs: 30_000,
};

export const DEFAULT_HEARTBEAT: HeartbeatConfig = {
  pingIntervalMs: 30_000,
  pongTimeoutMs: 120_000,
  idleTimeoutMs: null,
};

export const DEFAULT_OUTBOUND_QUEUE: OutboundQueueConfig = {
  capacity: 256,
  sendTimeoutMs: 5_000,
};

export type SendOutcome =
  | { status: "sent" }
  | { status: "queued"; reason: string }
  | { status: "rejected"; reason: string };

export type ConnectionEvent =
  | { type: "state"; state: ConnectionState; previous: ConnectionState; reason?: string }
  | { type: "message"; data: string }
  | { type: "reconnecting"; attempt: number; maxAttempts: number; delayMs: number }
  | { type: "failed"; attempts: number; reason: string }
  | { type: "closed"; code: number; reason: string };

export type ConnectionListener = (event: ConnectionEvent) => void;

export interface ManagedConnectionOptions {
  id: string;
  connector: TransportConnector;
  logger?: Logger;
  reconnect?: Partial<ReconnectPolicy>;
  heartbeat?: Partial<HeartbeatConfig>;
  queue?: Partial<OutboundQueueConfig>;
  /** Guards writes and pings; a refusing breaker pauses the backlog flush. */
  circuitBreaker?: CircuitBreaker;
  /** Payloads failing this check are rejected instead of queued for later. */
  isRoutable?: (payload: unknown) => boolean;
  now?: () => number;
}

export interface ConnectionStats {
  id: string;
  state: ConnectionState;
  reconnectAttempts: number;
  backlog: number;
  outbound: number;
  lastPongAt: number | null;
  lastActivityAt: number | null;
  circuit: CircuitBreakerSnapshot;
}

type Session = {
  transport: ChannelTransport;
  outbound: BoundedQueue<QueuedMessage>;
  tasks: TaskGroup;
  unsubscribe: Array<() => void>;
  ended: boolean;
};

/**
 * Lifecycle owner for one duplex channel.
 *
 * Both ends of the wire use this type. The client enables reconnect; the
 * server wraps an accepted socket with reconnect disabled, so an unexpected
 * close tears the connection down instead.
 *
 * Per live session there is one writer loop draining the bounded outbound
 * queue and one health-check interval that pings, enforces the pong/idle
 * timeouts and flushes the retry backlog. Both belong to the session's task
 * group and are cancelled together when the session ends.
 */
export class ManagedConnection {
  readonly id: string;

  private readonly connector: TransportConnector;
  private readonly logger: Logger;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly heartbeat: HeartbeatConfig;
  private readonly queueConfig: OutboundQueueConfig;
  private readonly breaker: CircuitBreaker;
  private readonly isRoutable: (payload: unknown) => boolean;
  private readonly now: () => number;

  private readonly listeners = new Set<ConnectionListener>();
  private readonly retryQueue = new RetryQueue();
  private readonly lifecycle = new TaskGroup();
  private state: ConnectionState = "disconnected";
  private session: Session | null = null;
  private reconnectAttempts = 0;
  private lastPongAt: number | null = null;
  private lastActivityAt: number | null = null;

  constructor(options: ManagedConnectionOptions) {
    this.id = options.id;
    this.connector = options.connector;
    this.logger = options.logger ?? consoleLogger;
    this.reconnectPolicy = { ...DEFAULT_RECONNECT_POLICY, ...options.reconnect };
    this.heartbeat = { ...DEFAULT_HEARTBEAT, ...options.heartbeat };
    this.queueConfig = { ...DEFAULT_OUTBOUND_QUEUE, ...options.queue };
    this.now = options.now ?? Date.now;
    this.breaker = options.circuitBreaker ?? new CircuitBreaker({}, this.now);
    this.isRoutable = options.isRoutable ?? (() => true);
  }

  getState(): ConnectionState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.state === "connected";
  }

  subscribe(listener: ConnectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Establishes the transport. Resolves true once connected; false when the
   * attempt failed (a reconnect may already be scheduled) or the connection
   * was closed meanwhile.
   */
  async connect(): Promise<boolean> {
    if (this.state === "connected") {
      return true;
    }
    if (this.state === "connecting" || this.state === "closed") {
      return false;
    }
    if (this.state === "failed") {
      this.reconnectAttempts = 0;
    }
    this.lifecycle.clearTimeouts();
    this.setState("connecting");

    let transport: ChannelTransport;
    try {
      transport = await this.connector();
    } catch (error) {
      if (this.getState() !== "connecting") {
        return false;
      }
      const reason = describeError(error);
      this.logger.warn(
        { connectionId: this.id, attempt: this.reconnectAttempts, err: error },
        "Connection attempt failed"
      );
      this.handleLoss({ code: CloseCode.Abnormal, reason });
      return false;
    }

    if (this.getState() !== "connecting") {
      transport.close(CloseCode.Normal, "Connection closed");
      return false;
    }
    this.install(transport);
    return true;
  }

  /**
   * Queues `payload` for delivery. "sent" means the writer accepted it;
   * "queued" means it sits in the retry backlog until a live connection
   * can take it.
   */
  async send(payload: unknown): Promise<SendOutcome> {
    if (this.state === "closed") {
      return { status: "rejected", reason: "Connection closed" };
    }
    const message: QueuedMessage = { data: JSON.stringify(payload), enqueuedAt: this.now() };
    const session = this.session;
    if (this.state !== "connected" || !session) {
      return this.enqueueForRetry(payload, message, "Not connected");
    }
    if (!this.retryQueue.isEmpty()) {
      const outcome = this.enqueueForRetry(payload, message, "Backlog pending");
      this.flushIfAllowed();
      return outcome;
    }

    const accepted = await session.outbound.offer(message, this.queueConfig.sendTimeoutMs);
    if (accepted) {
      return { status: "sent" };
    }
    this.logger.warn(
      { connectionId: this.id, timeoutMs: this.queueConfig.sendTimeoutMs },
      "Outbound queue full, spilling to retry queue"
    );
    return this.enqueueForRetry(payload, message, "Send timed out");
  }

  /** Records a liveness answer from the peer. */
  notePong(): void {
    const now = this.now();
    this.lastPongAt = now;
    this.lastActivityAt = now;
  }

  /** Idempotent. Cancels every timer and never triggers a reconnect. */
  close(code: number = CloseCode.Normal, reason = "Connection closed"): void {
    if (this.state === "closed") {
      return;
    }
    this.lifecycle.cancel();
    const session = this.session;
    this.session = null;
    if (session) {
      this.endSession(session);
      try {
        session.transport.close(code, reason);
      } catch (error) {
        this.logger.debug({ connectionId: this.id, err: error }, "Transport close failed");
      }
    }
    this.setState("closed", reason);
    this.emit({ type: "closed", code, reason });
  }

  /** Messages waiting in the retry backlog, oldest first. */
  pendingMessages(): string[] {
    return this.retryQueue.toArray().map((message) => message.data);
  }

  /** Drops backlog entries; returns how many were removed. */
  discardPending(predicate: (data: string) => boolean): number {
    return this.retryQueue.discard((message) => predicate(message.data)).length;
  }

  stats(): ConnectionStats {
    return {
      id: this.id,
      state: this.state,
      reconnectAttempts: this.reconnectAttempts,
      backlog: this.retryQueue.size,
      outbound: this.session?.outbound.size ?? 0,
      lastPongAt: this.lastPongAt,
      lastActivityAt: this.lastActivityAt,
      circuit: this.breaker.snapshot(),
    };
  }

  private install(transport: ChannelTransport): void {
    const session: Session = {
      transport,
      outbound: new BoundedQueue<QueuedMessage>(this.queueConfig.capacity),
      tasks: new TaskGroup(),
      unsubscribe: [],
      ended: false,
    };
    this.session = session;
    this.reconnectAttempts = 0;
    const now = this.now();
    this.lastPongAt = now;
    this.lastActivityAt = now;

    session.unsubscribe.push(
      transport.onMessage((data) => {
        if (session.ended) {
          return;
        }
        this.lastActivityAt = this.now();
        this.emit({ type: "message", data });
      }),
      transport.onPong(() => {
        if (!session.ended) {
          this.notePong();
        }
      }),
      transport.onClose((event) => {
        this.handleUnexpectedClose(session, event);
      }),
      transport.onError((error) => {
        this.logger.warn({ connectionId: this.id, err: error }, "Transport error");
      })
    );

    this.setState("connected");
    session.tasks.setInterval(() => this.healthCheck(session), this.heartbeat.pingIntervalMs);
    void this.runWriter(session).catch((error: unknown) => {
      this.logger.error({ connectionId: this.id, err: error }, "Writer loop crashed");
    });
    this.flushIfAllowed();
  }

  private async runWriter(session: Session): Promise<void> {
    for (;;) {
      const message = await session.outbound.take();
      if (message === null) {
        return;
      }
      if (session.ended) {
        this.retryQueue.requeueFront([message]);
        return;
      }
      try {
        await session.transport.send(message.data);
        this.breaker.recordSuccess();
      } catch (error) {
        this.breaker.recordFailure();
        if (session.ended) {
          this.retryQueue.requeueFront([message]);
          return;
        }
        this.logger.warn({ connectionId: this.id, err: error }, "Write failed");
        this.retryQueue.requeueFront([message, ...session.outbound.close()]);
        const event = { code: CloseCode.WriteFailed, reason: "Write failed" };
        this.handleUnexpectedClose(session, event);
        this.closeTransportQuietly(session, event);
        return;
      }
    }
  }

  private healthCheck(session: Session): void {
    if (session.ended || this.state !== "connected") {
      return;
    }
    const now = this.now();
    if (this.lastPongAt !== null && now - this.lastPongAt > this.heartbeat.pongTimeoutMs) {
      this.breaker.recordFailure();
      this.logger.warn(
        { connectionId: this.id, silentForMs: now - this.lastPongAt },
        "Pong timeout, closing connection"
      );
      const event = { code: CloseCode.PongTimeout, reason: "Pong timeout" };
      this.handleUnexpectedClose(session, event);
      this.closeTransportQuietly(session, event);
      return;
    }
    const idleTimeoutMs = this.heartbeat.idleTimeoutMs;
    if (
      idleTimeoutMs !== null &&
      this.lastActivityAt !== null &&
      now - this.lastActivityAt > idleTimeoutMs
    ) {
      this.logger.info({ connectionId: this.id, idleTimeoutMs }, "Closing idle connection");
      this.close(CloseCode.IdleTimeout, "Idle timeout");
      return;
    }

    try {
      session.transport.ping();
      this.breaker.recordSuccess();
    } catch (error) {
      this.breaker.recordFailure();
      this.logger.warn({ connectionId: this.id, err: error }, "Ping failed");
    }
    this.flushIfAllowed();
  }

  /**
   * Moves backlog entries into the outbound queue, oldest first. Stops at the
   * first entry that does not fit and puts it back at the front.
   */
  private flushIfAllowed(): void {
    const session = this.session;
    if (!session || session.ended || this.state !== "connected" || this.retryQueue.isEmpty()) {
      return;
    }
    if (!this.breaker.allow()) {
      this.logger.debug(
        { connectionId: this.id, backlog: this.retryQueue.size },
        "Circuit open, skipping backlog flush"
      );
      return;
    }
    let flushed = 0;
    for (;;) {
      const message = this.retryQueue.shift();
      if (!message) {
        break;
      }
      if (!session.outbound.tryOffer(message)) {
        this.retryQueue.requeueFront([message]);
        break;
      }
      flushed += 1;
    }
    if (flushed > 0) {
      this.logger.debug(
        { connectionId: this.id, flushed, remaining: this.retryQueue.size },
        "Flushed backlog"
      );
    }
  }

  private enqueueForRetry(payload: unknown, message: QueuedMessage, reason: string): SendOutcome {
    if (this.state === "closed") {
      return { status: "rejected", reason: "Connection closed" };
    }
    if (!this.isRoutable(payload)) {
      this.logger.warn({ connectionId: this.id }, "Dropping message without a routing field");
      return { status: "rejected", reason: "Message has no provider and cannot be delivered" };
    }
    this.retryQueue.push(message);
    return { status: "queued", reason };
  }

  private handleUnexpectedClose(session: Session, event: TransportCloseEvent): void {
    if (session.ended || this.session !== session) {
      return;
    }
    this.session = null;
    this.endSession(session);
    this.logger.info(
      { connectionId: this.id, code: event.code, reason: event.reason },
      "Connection lost"
    );
    this.setState("disconnected", describeTransportClose(event));
    this.handleLoss(event);
  }

  /** Reconnect procedure, or teardown when reconnect is disabled. */
  private handleLoss(event: TransportCloseEvent): void {
    const reason = describeTransportClose(event);
    if (!this.reconnectPolicy.enabled) {
      this.close(event.code, reason);
      return;
    }
    if (this.reconnectAttempts >= this.reconnectPolicy.maxAttempts) {
      this.logger.error(
        { connectionId: this.id, attempts: this.reconnectAttempts },
        "Reconnect attempts exhausted"
      );
      this.setState("failed", reason);
      this.emit({ type: "failed", attempts: this.reconnectAttempts, reason });
      return;
    }
    this.reconnectAttempts += 1;
    const delayMs = computeBackoffDelay(this.reconnectAttempts, this.reconnectPolicy);
    this.setState("reconnecting", reason);
    this.emit({
      type: "reconnecting",
      attempt: this.reconnectAttempts,
      maxAttempts: this.reconnectPolicy.maxAttempts,
      delayMs,
    });
    this.lifecycle.setTimeout(() => {
      void this.connect();
    }, delayMs);
  }

  private endSession(session: Session): void {
    session.ended = true;
    session.tasks.cancel();
    for (const unsubscribe of session.unsubscribe) {
      unsubscribe();
    }
    session.unsubscribe = [];
    this.retryQueue.requeueFront(session.outbound.close());
  }

  private closeTransportQuietly(session: Session, event: TransportCloseEvent): void {
    try {
      session.transport.close(event.code, event.reason);
    } catch (error) {
      this.logger.debug({ connectionId: this.id, err: error }, "Transport close failed");
    }
  }

  private setState(next: ConnectionState, reason?: string): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.emit({ type: "state", state: next, previous, ...(reason ? { reason } : {}) });
  }

  private emit(event: ConnectionEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(
          { connectionId: this.id, event: event.type, err: error },
          "Connection listener threw"
        );
      }
    }
  }
}
