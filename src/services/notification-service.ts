/**
 * Notification service
 * Business validation on top of the store. Knows nothing about live
 * connections: whoever creates a notification triggers the broadcast.
 */

import type { NotificationStore } from '../db/store.js';
import type { Notification } from '../types/index.js';
import { InvalidArgumentError } from '../errors.js';
import { generateNotificationId, isBlank } from '../utils.js';

export interface NotificationServiceOptions {
  generateId?: (now: Date) => string;
  now?: () => Date;
}

export class NotificationService {
  private store: NotificationStore;
  private generateId: (now: Date) => string;
  private now: () => Date;

  constructor(store: NotificationStore, options: NotificationServiceOptions = {}) {
    this.store = store;
    this.generateId = options.generateId ?? generateNotificationId;
    this.now = options.now ?? (() => new Date());
  }

  listUnread(): Notification[] {
    return this.store.list('unread');
  }

  /** Full listing, read records included (debug/introspection). */
  listAll(): Notification[] {
    return this.store.list('all');
  }

  create(title: string, message: string): Notification {
    if (isBlank(title) || isBlank(message)) {
      throw new InvalidArgumentError('title and message are required');
    }

    const createdAt = this.now();
    const notification: Notification = {
      id: this.generateId(createdAt),
      title,
      message,
      timestamp: createdAt.toISOString(),
      read: false,
    };

    this.store.insert(notification);
    return { ...notification };
  }

  markRead(id: string): void {
    if (isBlank(id)) {
      throw new InvalidArgumentError('notification ID is required');
    }
    this.store.markRead(id);
  }

  clearAll(): void {
    this.store.clear();
  }

  count(): number {
    return this.store.size();
  }
}
