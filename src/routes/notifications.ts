import { Router, type NextFunction, type Request, type Response } from 'express';
import type { NotificationService } from '../services/notification-service.js';
import type { ConnectionRegistry } from '../websocket/registry.js';

export function createNotificationsRouter(
  notificationService: NotificationService,
  registry: ConnectionRegistry,
): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { title, message } = req.body ?? {};
      if (typeof title !== 'string' || typeof message !== 'string') {
        res.status(400).json({ error: 'title and message are required' });
        return;
      }
      const notification = notificationService.create(title, message);
      await registry.broadcast(notification);
      res.status(201).json(notification);
    } catch (err) {
      next(err);
    }
  });

  router.get('/', (_req: Request, res: Response) => {
    res.json({ notifications: notificationService.listUnread() });
  });

  // Debug: everything, read included
  router.get('/all', (_req: Request, res: Response) => {
    res.json({ notifications: notificationService.listAll() });
  });

  router.put('/:id/read', (req: Request, res: Response, next: NextFunction) => {
    try {
      notificationService.markRead(req.params.id);
      res.json({ success: true });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/', (_req: Request, res: Response) => {
    notificationService.clearAll();
    res.json({ success: true });
  });

  return router;
}
