/**
 * LiveConnection backed by a `ws` socket, with a per-send deadline and a
 * bound on outbound buffered bytes so one stalled peer cannot hold up a
 * broadcast.
 */

import { WebSocket, type RawData } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import type { LiveConnection } from '../types/index.js';
import { ConnectionFailureError } from '../errors.js';

/** The subset of a `ws` socket the connection writes through. */
export interface OutboundSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string, cb: (error?: Error) => void): void;
  terminate(): void;
}

export interface WsConnectionOptions {
  sendTimeoutMs: number;
  maxBufferedBytes: number;
}

export const DEFAULT_CONNECTION_OPTIONS: WsConnectionOptions = {
  sendTimeoutMs: 5000,
  maxBufferedBytes: 1024 * 1024,
};

export class WsLiveConnection implements LiveConnection {
  readonly id: string = uuidv4();
  private socket: OutboundSocket;
  private options: WsConnectionOptions;

  constructor(socket: OutboundSocket, options: WsConnectionOptions = DEFAULT_CONNECTION_OPTIONS) {
    this.socket = socket;
    this.options = options;
  }

  send(frame: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionFailureError(`connection ${this.id} is not open`));
    }
    if (this.socket.bufferedAmount > this.options.maxBufferedBytes) {
      return Promise.reject(new ConnectionFailureError(
        `connection ${this.id} has ${this.socket.bufferedAmount} bytes queued (limit ${this.options.maxBufferedBytes})`,
      ));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new ConnectionFailureError(
          `send to ${this.id} timed out after ${this.options.sendTimeoutMs}ms`,
        ));
      }, this.options.sendTimeoutMs);

      this.socket.send(frame, (error) => {
        clearTimeout(timer);
        if (error) {
          reject(new ConnectionFailureError(`send to ${this.id} failed: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    this.socket.terminate();
  }
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}
