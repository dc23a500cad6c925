/**
 * Connection registry and broadcaster
 *
 * Tracks the live connections and fans each new notification out to all of
 * them. A connection whose send fails is treated as dead: it is closed and
 * unregistered, and delivery to the others continues.
 */

import type { LiveConnection, Logger, Notification } from '../types/index.js';
import { errorMessage } from '../errors.js';
import { encodeFrame } from './protocol.js';

export interface BroadcastReport {
  delivered: number;
  dropped: number;
}

export class ConnectionRegistry {
  private connections: Set<LiveConnection> = new Set();
  private logger: Logger;

  constructor(logger: Logger = console) {
    this.logger = logger;
  }

  register(conn: LiveConnection): void {
    this.connections.add(conn);
  }

  /** Returns false if the connection was not registered. */
  unregister(conn: LiveConnection): boolean {
    return this.connections.delete(conn);
  }

  has(conn: LiveConnection): boolean {
    return this.connections.has(conn);
  }

  size(): number {
    return this.connections.size;
  }

  /**
   * Deliver one `notification` frame to every connection registered when the
   * call starts. Frames are enqueued synchronously and in call order, so
   * successive broadcasts reach each peer in the order they were issued.
   * Never rejects.
   */
  async broadcast(notification: Notification): Promise<BroadcastReport> {
    const frame = encodeFrame({ type: 'notification', notification });
    const targets = [...this.connections];

    const results = await Promise.allSettled(
      targets.map(async (conn) => conn.send(frame)),
    );

    let delivered = 0;
    let dropped = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        delivered++;
        return;
      }
      dropped++;
      this.drop(targets[index], result.reason);
    });

    return { delivered, dropped };
  }

  private drop(conn: LiveConnection, reason: unknown): void {
    this.logger.error(`Error broadcasting to client ${conn.id}:`, errorMessage(reason));
    this.unregister(conn);
    try {
      conn.close();
    } catch (error) {
      this.logger.error(`Error closing client ${conn.id}:`, errorMessage(error));
    }
  }
}
