import { Router } from 'express';
import type { NotificationService } from '../services/notification-service.js';
import type { ConnectionRegistry } from '../websocket/registry.js';

export interface HealthResponse {
  status: 'ok';
  message: string;
  connections: number;
  notifications: number;
}

export function createHealthRouter(
  notificationService: NotificationService,
  registry: ConnectionRegistry,
): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const body: HealthResponse = {
      status: 'ok',
      message: 'Bellhop server is running',
      connections: registry.size(),
      notifications: notificationService.count(),
    };
    res.json(body);
  });

  return router;
}
