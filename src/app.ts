import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { NotificationService } from './services/notification-service.js';
import type { ConnectionRegistry } from './websocket/registry.js';
import type { Logger } from './types/index.js';
import { NotificationError, type NotificationErrorCode } from './errors.js';
import { createNotificationsRouter } from './routes/notifications.js';
import { createHealthRouter } from './routes/health.js';

export interface AppOptions {
  corsOrigin?: string;
  staticDir?: string;
  logger?: Logger;
}

const STATUS_BY_CODE: Record<NotificationErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  CONNECTION_FAILURE: 500,
};

function statusOf(err: unknown): number {
  if (err instanceof NotificationError) {
    return STATUS_BY_CODE[err.code];
  }
  // body-parser errors carry their own 4xx status
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createApp(
  notificationService: NotificationService,
  registry: ConnectionRegistry,
  options: AppOptions = {},
): Express {
  const logger = options.logger ?? console;
  const app = express();

  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  app.use(express.json());

  app.use('/api/health', createHealthRouter(notificationService, registry));
  app.use('/api/notifications', createNotificationsRouter(notificationService, registry));

  if (options.staticDir) {
    app.use(express.static(options.staticDir));
  }

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error ? err.message : 'Internal server error';
    if (status >= 500) {
      logger.error('Request failed:', message);
    }
    res.status(status).json({ error: message });
  });

  return app;
}
