import type { NodeSocketEvent, NodeSocketLike } from "../shared/transport.js";

type Listener = (...args: unknown[]) => void;

/** Stand-in for a `ws` server socket. */
export class MockSocket implements NodeSocketLike {
  readyState = 1;
  readonly sent: string[] = [];
  readonly closeCalls: Array<{ code?: number; reason?: string }> = [];
  pings = 0;
  sendError: Error | null = null;
  private readonly listeners = new Map<NodeSocketEvent, Set<Listener>>();

  send(data: string, callback: (error?: Error) => void): void {
    if (this.sendError) {
      callback(this.sendError);
      return;
    }
    this.sent.push(data);
    callback();
  }

  ping(): void {
    this.pings += 1;
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.readyState = 3;
  }

  on(event: NodeSocketEvent, listener: Listener): this {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(listener);
    return this;
  }

  off(event: NodeSocketEvent, listener: Listener): this {
    this.listeners.get(event)?.delete(listener);
    return this;
  }

  listenerCount(event: NodeSocketEvent): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  /** Like an EventEmitter, an "error" nobody listens for is thrown. */
  emit(event: NodeSocketEvent, ...args: unknown[]): void {
    if (event === "error" && this.listenerCount("error") === 0) {
      throw args[0] instanceof Error ? args[0] : new Error("Unhandled socket error");
    }
    for (const listener of [...(this.listeners.get(event) ?? [])]) {
      listener(...args);
    }
  }

  /** Delivers a text frame the way `ws` does, as a Buffer. */
  receive(payload: unknown): void {
    const text = typeof payload === "string" ? payload : JSON.stringify(payload);
    this.emit("message", Buffer.from(text), false);
  }

  sentJson(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }
}
