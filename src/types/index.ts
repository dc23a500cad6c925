/**
 * Core types for Bellhop notifications and live connections
 */

export interface Notification {
  id: string;
  title: string;
  message: string;
  timestamp: string; // ISO-8601 creation time
  read: boolean;
}

export type ListScope = 'all' | 'unread';

/**
 * A push channel to one connected client. The registry owns the
 * registration, never the underlying socket.
 */
export interface LiveConnection {
  readonly id: string;
  /** Resolves once the frame is handed off; rejects if the peer is dead or stalled. */
  send(frame: string): Promise<void>;
  close(): void;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
