import { type Logger, SilentLogger, toError } from '../core/types/Logger';
import type { BroadcastModel } from '../protocol/ResponseModel';

/**
 * What the manager needs from a connection
 */
export interface ManagedConnection {
  readonly id: string;
  sendBroadcast(message: BroadcastModel): Promise<void>;
  close(code?: number, reason?: string): void;
}

/**
 * Registry of live connections
 */
export class ConnectionManager<TConnection extends ManagedConnection = ManagedConnection> {
  private readonly connections = new Map<string, TConnection>();
  private readonly logger: Logger;

  constructor(logger: Logger = new SilentLogger()) {
    this.logger = logger;
  }

  connect(connection: TConnection): void {
    this.connections.set(connection.id, connection);
    this.logger.debug('Connection registered', {
      connectionId: connection.id,
      connections: this.connections.size,
    });
  }

  /**
   * @returns false when the connection was not registered
   */
  disconnect(connection: TConnection): boolean {
    const removed = this.connections.delete(connection.id);
    if (removed) {
      this.logger.debug('Connection removed', {
        connectionId: connection.id,
        connections: this.connections.size,
      });
    }
    return removed;
  }

  get size(): number {
    return this.connections.size;
  }

  all(): TConnection[] {
    return [...this.connections.values()];
  }

  /**
   * Send to every connection concurrently. A failing connection is logged and
   * does not affect the others.
   *
   * @returns number of connections the message was delivered to
   */
  async broadcast(message: BroadcastModel): Promise<number> {
    const targets = this.all();
    const results = await Promise.allSettled(
      targets.map((connection) => connection.sendBroadcast(message))
    );

    let delivered = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        delivered++;
        return;
      }
      this.logger.error('Broadcast failed', toError(result.reason), {
        connectionId: targets[index]?.id,
        pkgId: message.pkgId,
      });
    });
    return delivered;
  }

  /**
   * Close every connection and forget it
   */
  closeAll(code: number, reason: string): void {
    for (const connection of this.connections.values()) {
      connection.close(code, reason);
    }
    this.connections.clear();
  }
}
