/**
 * Duplex channel abstraction used by `ManagedConnection` on both ends of the
 * wire, plus adapters for `ws` server sockets and browser-style WebSockets.
 */

export type TransportCloseEvent = {
  code: number;
  reason: string;
};

export type ChannelTransport = {
  /** Resolves once the frame has been handed to the socket. */
  send: (data: string) => Promise<void>;
  /** Emits a liveness probe; the peer's answer arrives through `onPong`. */
  ping: () => void;
  close: (code?: number, reason?: string) => void;
  onMessage: (handler: (data: string) => void) => () => void;
  onPong: (handler: () => void) => () => void;
  onClose: (handler: (event: TransportCloseEvent) => void) => () => void;
  onError: (handler: (error: Error) => void) => () => void;
};

/** Establishes a transport, resolving once it is open. */
export type TransportConnector = () => Promise<ChannelTransport>;

export const CloseCode = {
  Normal: 1000,
  NoStatus: 1005,
  Abnormal: 1006,
  PongTimeout: 4000,
  IdleTimeout: 4001,
  WriteFailed: 4002,
} as const;

const WS_OPEN = 1;

type Listener<A extends unknown[]> = (...args: A) => void;

class ListenerSet<A extends unknown[]> {
  private readonly listeners = new Set<Listener<A>>();

  add(listener: Listener<A>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(...args: A): void {
    for (const listener of [...this.listeners]) {
      listener(...args);
    }
  }

  clear(): void {
    this.listeners.clear();
  }
}

// ---------------------------------------------------------------------------
// Server side: sockets accepted by `ws`
// ---------------------------------------------------------------------------

export type NodeSocketEvent = "message" | "pong" | "close" | "error";

/** The slice of a `ws` WebSocket the daemon relies on. */
export interface NodeSocketLike {
  readonly readyState: number;
  send(data: string, callback: (error?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  on(event: NodeSocketEvent, listener: (...args: unknown[]) => void): unknown;
  off(event: NodeSocketEvent, listener: (...args: unknown[]) => void): unknown;
}

export function createNodeSocketTransport(ws: NodeSocketLike): ChannelTransport {
  const bind = (event: NodeSocketEvent, listener: (...args: unknown[]) => void) => {
    ws.on(event, listener);
    return () => {
      ws.off(event, listener);
    };
  };

  return {
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WS_OPEN) {
          reject(new Error(`WebSocket not open (readyState=${ws.readyState})`));
          return;
        }
        ws.send(data, (error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
    ping: () => {
      if (ws.readyState === WS_OPEN) {
        ws.ping();
      }
    },
    close: (code, reason) => ws.close(code, reason),
    onMessage: (handler) =>
      bind("message", (data) => {
        const text = decodeMessageData(data);
        if (text !== null) {
          handler(text);
        }
      }),
    onPong: (handler) => bind("pong", () => handler()),
    onClose: (handler) =>
      bind("close", (code, reason) => {
        handler({
          code: typeof code === "number" ? code : CloseCode.NoStatus,
          reason: decodeMessageData(reason) ?? "",
        });
      }),
    onError: (handler) =>
      bind("error", (error) => {
        handler(error instanceof Error ? error : new Error(describeTransportError(error)));
      }),
  };
}

// ---------------------------------------------------------------------------
// Client side: browser-style WebSocket (DOM WebSocket or `ws` in Node)
// ---------------------------------------------------------------------------

export type WebSocketEventName = "open" | "close" | "error" | "message";

export type WebSocketLike = {
  readonly readyState: number;
  send: (data: string) => void;
  close: (code?: number, reason?: string) => void;
  addEventListener: (event: WebSocketEventName, listener: (event: unknown) => void) => void;
  removeEventListener: (event: WebSocketEventName, listener: (event: unknown) => void) => void;
};

export type WebSocketFactory = (
  url: string,
  options?: { headers?: Record<string, string> }
) => WebSocketLike;

export function bindWsHandler(
  ws: WebSocketLike,
  event: WebSocketEventName,
  handler: (event: unknown) => void
): () => void {
  ws.addEventListener(event, handler);
  return () => {
    ws.removeEventListener(event, handler);
  };
}

/**
 * Browsers cannot send protocol-level pings, so the heartbeat travels as the
 * `{"type":"ping"}` envelope and the `{"type":"pong"}` answer is surfaced
 * through `onPong` instead of `onMessage`.
 */
export function createWebSocketTransport(ws: WebSocketLike): ChannelTransport {
  const messages = new ListenerSet<[string]>();
  const pongs = new ListenerSet<[]>();
  const closes = new ListenerSet<[TransportCloseEvent]>();
  const errors = new ListenerSet<[Error]>();

  const unbind = [
    bindWsHandler(ws, "message", (event) => {
      const text = decodeMessageData(extractEventData(event));
      if (text === null) {
        return;
      }
      if (isPongEnvelope(text)) {
        pongs.emit();
        return;
      }
      messages.emit(text);
    }),
    bindWsHandler(ws, "close", (event) => {
      for (const release of unbind) {
        release();
      }
      closes.emit(toCloseEvent(event));
    }),
    bindWsHandler(ws, "error", (event) => {
      errors.emit(new Error(describeTransportError(event)));
    }),
  ];

  return {
    send: async (data) => {
      if (ws.readyState !== WS_OPEN) {
        throw new Error(`WebSocket not open (readyState=${ws.readyState})`);
      }
      ws.send(data);
    },
    ping: () => {
      if (ws.readyState === WS_OPEN) {
        ws.send(JSON.stringify({ type: "ping" }));
      }
    },
    close: (code, reason) => ws.close(code, reason),
    onMessage: (handler) => messages.add(handler),
    onPong: (handler) => pongs.add(handler),
    onClose: (handler) => closes.add(handler),
    onError: (handler) => errors.add(handler),
  };
}

export type OpenWebSocketOptions = {
  url: string;
  factory: WebSocketFactory;
  headers?: Record<string, string>;
  handshakeTimeoutMs?: number;
};

/**
 * Opens a socket and resolves with its transport once the `open` event fires.
 * Rejects when the socket errors, closes or times out first.
 */
export function openWebSocketTransport(options: OpenWebSocketOptions): Promise<ChannelTransport> {
  return new Promise<ChannelTransport>((resolve, reject) => {
    let ws: WebSocketLike;
    try {
      ws = options.factory(options.url, { headers: options.headers });
    } catch (error) {
      reject(error instanceof Error ? error : new Error(String(error)));
      return;
    }

    let settled = false;
    const cleanup: Array<() => void> = [];
    const settle = (outcome: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      for (const release of cleanup) {
        release();
      }
      outcome();
    };

    cleanup.push(
      bindWsHandler(ws, "open", () => {
        settle(() => resolve(createWebSocketTransport(ws)));
      }),
      bindWsHandler(ws, "error", (event) => {
        settle(() => reject(new Error(describeTransportError(event))));
      }),
      bindWsHandler(ws, "close", (event) => {
        settle(() => reject(new Error(describeTransportClose(toCloseEvent(event)))));
      })
    );

    if (options.handshakeTimeoutMs && options.handshakeTimeoutMs > 0) {
      const timer = setTimeout(() => {
        settle(() => {
          ws.close(CloseCode.Normal, "Handshake timeout");
          reject(new Error(`WebSocket handshake timed out after ${options.handshakeTimeoutMs}ms`));
        });
      }, options.handshakeTimeoutMs);
      cleanup.push(() => clearTimeout(timer));
    }
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isPongEnvelope(text: string): boolean {
  if (!text.includes("pong")) {
    return false;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return (
      typeof parsed === "object" &&
      parsed !== null &&
      "type" in parsed &&
      parsed.type === "pong"
    );
  } catch {
    return false;
  }
}

function extractEventData(event: unknown): unknown {
  if (event && typeof event === "object" && "data" in event) {
    return event.data;
  }
  return event;
}

export function toCloseEvent(event: unknown): TransportCloseEvent {
  if (event && typeof event === "object") {
    const code = "code" in event && typeof event.code === "number" ? event.code : CloseCode.NoStatus;
    const reason = "reason" in event && typeof event.reason === "string" ? event.reason : "";
    return { code, reason };
  }
  return { code: CloseCode.NoStatus, reason: "" };
}

export function describeTransportClose(event?: TransportCloseEvent): string {
  if (!event) {
    return "Transport closed";
  }
  if (event.reason.trim().length > 0) {
    return event.reason.trim();
  }
  return `Transport closed (code ${event.code})`;
}

export function describeTransportError(event?: unknown): string {
  if (!event) {
    return "Transport error";
  }
  if (event instanceof Error) {
    return event.message;
  }
  if (typeof event === "string") {
    return event;
  }
  if (typeof event === "object" && "message" in event) {
    const message = event.message;
    if (typeof message === "string" && message.trim().length > 0) {
      return message.trim();
    }
  }
  return "Transport error";
}

export function decodeMessageData(data: unknown): string | null {
  if (data === null || data === undefined) {
    return null;
  }
  if (typeof data === "string") {
    return data;
  }
  if (Array.isArray(data)) {
    const chunks = data.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk));
    return Buffer.concat(chunks).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("utf8");
  }
  return null;
}
