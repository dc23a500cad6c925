/**
 * Wires the store, service, registry and protocol handler into one HTTP
 * server carrying both the REST gateway and the `/ws` endpoint.
 */

import { createServer, type Server } from 'http';
import type { AddressInfo } from 'net';
import type { Express } from 'express';
import { NotificationStore } from './db/store.js';
import { NotificationService, type NotificationServiceOptions } from './services/notification-service.js';
import { ConnectionRegistry } from './websocket/registry.js';
import { ProtocolHandler } from './websocket/protocol.js';
import { NotificationWSServer } from './websocket/server.js';
import { DEFAULT_CONNECTION_OPTIONS } from './websocket/connection.js';
import { createApp } from './app.js';
import type { Logger } from './types/index.js';
import type { ServerConfig } from './config.js';

export type BellhopServerOptions = Partial<Omit<ServerConfig, 'port' | 'host'>> & {
  logger?: Logger;
  service?: NotificationServiceOptions;
};

export interface BellhopServer {
  app: Express;
  httpServer: Server;
  wsServer: NotificationWSServer;
  service: NotificationService;
  registry: ConnectionRegistry;
  listen(port: number, host?: string): Promise<AddressInfo>;
  close(): Promise<void>;
}

export function createBellhopServer(options: BellhopServerOptions = {}): BellhopServer {
  const logger = options.logger ?? console;

  const store = new NotificationStore();
  const service = new NotificationService(store, options.service);
  const registry = new ConnectionRegistry(logger);
  const handler = new ProtocolHandler(service, logger);

  const app = createApp(service, registry, {
    corsOrigin: options.corsOrigin,
    staticDir: options.staticDir,
    logger,
  });
  const httpServer = createServer(app);
  const wsServer = new NotificationWSServer(httpServer, registry, handler, {
    logger,
    connection: {
      sendTimeoutMs: options.sendTimeoutMs ?? DEFAULT_CONNECTION_OPTIONS.sendTimeoutMs,
      maxBufferedBytes: options.maxBufferedBytes ?? DEFAULT_CONNECTION_OPTIONS.maxBufferedBytes,
    },
  });

  if (options.seedNotifications) {
    service.create('Server started', 'Bellhop is up and accepting notifications');
  }

  return {
    app,
    httpServer,
    wsServer,
    service,
    registry,

    listen(port: number, host?: string): Promise<AddressInfo> {
      return new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(port, host, () => {
          httpServer.off('error', reject);
          const address = httpServer.address();
          if (address === null || typeof address === 'string') {
            reject(new Error(`Unexpected listen address: ${address}`));
            return;
          }
          resolve(address);
        });
      });
    },

    async close(): Promise<void> {
      await wsServer.close();
      if (!httpServer.listening) return;
      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}
