/**
 * WebSocket server for real-time notification delivery
 * Accepts upgrades on the HTTP server, registers each socket for broadcast
 * and feeds its frames, one at a time, to the protocol handler.
 */

import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { Logger } from '../types/index.js';
import type { ConnectionRegistry } from './registry.js';
import type { ProtocolHandler } from './protocol.js';
import { errorMessage } from '../errors.js';
import {
  DEFAULT_CONNECTION_OPTIONS,
  WsLiveConnection,
  rawDataToString,
  type WsConnectionOptions,
} from './connection.js';

export interface NotificationWSServerOptions {
  path?: string;
  connection?: WsConnectionOptions;
  logger?: Logger;
}

export class NotificationWSServer {
  private wss: WebSocketServer;
  private registry: ConnectionRegistry;
  private handler: ProtocolHandler;
  private connectionOptions: WsConnectionOptions;
  private logger: Logger;

  constructor(
    server: Server,
    registry: ConnectionRegistry,
    handler: ProtocolHandler,
    options: NotificationWSServerOptions = {},
  ) {
    this.registry = registry;
    this.handler = handler;
    this.connectionOptions = options.connection ?? DEFAULT_CONNECTION_OPTIONS;
    this.logger = options.logger ?? console;
    this.wss = new WebSocketServer({ server, path: options.path ?? '/ws' });

    this.setupServer();
  }

  private setupServer(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      const conn = new WsLiveConnection(ws, this.connectionOptions);
      this.registry.register(conn);
      this.logger.log(`WebSocket connection established (${conn.id})`);

      let closed = false;
      const closeConnection = (reason: string) => {
        if (closed) return;
        closed = true;
        this.registry.unregister(conn);
        conn.close();
        this.logger.log(`WebSocket connection closed (${conn.id}): ${reason}`);
      };

      // Frames from one peer are handled strictly in arrival order.
      let pending: Promise<void> = Promise.resolve();
      ws.on('message', (data) => {
        const raw = rawDataToString(data);
        pending = pending
          .then(async () => {
            if (closed) return;
            const outcome = await this.handler.handle(conn, raw);
            if (outcome === 'close') {
              closeConnection('malformed frame or failed reply');
            }
          })
          .catch((error: unknown) => {
            this.logger.error(`WebSocket message handling error (${conn.id}):`, errorMessage(error));
            closeConnection('handler failure');
          });
      });

      ws.on('close', () => {
        closeConnection('peer closed');
      });

      ws.on('error', (error) => {
        this.logger.error(`WebSocket read error (${conn.id}):`, error.message);
        closeConnection('socket error');
      });
    });

    this.wss.on('error', (error) => {
      this.logger.error('WebSocket server error:', error.message);
    });
  }

  close(): Promise<void> {
    this.wss.clients.forEach((client) => client.terminate());
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
