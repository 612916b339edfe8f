import type { ChannelTransport, TransportCloseEvent } from "../shared/transport.js";

type Handlers = {
  message: Set<(data: string) => void>;
  pong: Set<() => void>;
  close: Set<(event: TransportCloseEvent) => void>;
  error: Set<(error: Error) => void>;
};

function register<T>(set: Set<T>, handler: T): () => void {
  set.add(handler);
  return () => {
    set.delete(handler);
  };
}

/**
 * Scripted in-memory transport. Sends succeed unless failures are switched on
 * with `setFailSends` or queued one at a time with `failNextSend`.
 */
export function createFakeTransport() {
  const handlers: Handlers = {
    message: new Set(),
    pong: new Set(),
    close: new Set(),
    error: new Set(),
  };
  const sent: string[] = [];
  const attempted: string[] = [];
  const closeCalls: Array<{ code?: number; reason?: string }> = [];
  let pings = 0;
  let failSends = false;
  let pendingFailures = 0;
  let gate: Promise<void> | null = null;
  let openGate: (() => void) | null = null;

  const transport: ChannelTransport = {
    send: async (data) => {
      attempted.push(data);
      if (gate) {
        await gate;
      }
      if (failSends || pendingFailures > 0) {
        pendingFailures = Math.max(0, pendingFailures - 1);
        throw new Error("socket write failed");
      }
      sent.push(data);
    },
    ping: () => {
      pings += 1;
    },
    close: (code, reason) => {
      closeCalls.push({ code, reason });
    },
    onMessage: (handler) => register(handlers.message, handler),
    onPong: (handler) => register(handlers.pong, handler),
    onClose: (handler) => register(handlers.close, handler),
    onError: (handler) => register(handlers.error, handler),
  };

  return {
    transport,
    sent,
    attempted,
    closeCalls,
    get pings() {
      return pings;
    },
    get listenerCount() {
      return (
        handlers.message.size + handlers.pong.size + handlers.close.size + handlers.error.size
      );
    },
    setFailSends(value: boolean) {
      failSends = value;
    },
    failNextSend() {
      pendingFailures += 1;
    },
    /** Holds every send until `releaseSends` is called. */
    blockSends() {
      gate = new Promise<void>((resolve) => {
        openGate = resolve;
      });
    },
    releaseSends() {
      openGate?.();
      gate = null;
      openGate = null;
    },
    emitMessage(data: string) {
      for (const handler of [...handlers.message]) handler(data);
    },
    emitPong() {
      for (const handler of [...handlers.pong]) handler();
    },
    emitClose(code = 1006, reason = "") {
      for (const handler of [...handlers.close]) handler({ code, reason });
    },
    emitError(error: Error) {
      for (const handler of [...handlers.error]) handler(error);
    },
  };
}

export type FakeTransport = ReturnType<typeof createFakeTransport>;
