import type { ConnectionStats, ManagedConnection } from "../shared/managed-connection.js";

/**
 * Bookkeeping of live connections by id. Created once per daemon and passed
 * to whatever needs lookup; it never reaches into a connection's own state
 * beyond reading stats.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, ManagedConnection>();

  get size(): number {
    return this.connections.size;
  }

  add(connection: ManagedConnection): void {
    this.connections.set(connection.id, connection);
  }

  remove(id: string): boolean {
    return this.connections.delete(id);
  }

  get(id: string): ManagedConnection | undefined {
    return this.connections.get(id);
  }

  list(): ManagedConnection[] {
    return [...this.connections.values()];
  }

  stats(): ConnectionStats[] {
    return this.list().map((connection) => connection.stats());
  }

  /** Closes every connection and empties the registry. */
  closeAll(code?: number, reason?: string): void {
    const connections = this.list();
    this.connections.clear();
    for (const connection of connections) {
      connection.close(code, reason);
    }
  }
}
