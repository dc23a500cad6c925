/**
 * In-memory notification store
 *
 * Holds the canonical newest-first sequence. Every method is synchronous,
 * so a mutation runs to completion before any other read or mutation on
 * the event loop can observe the store.
 */

import type { ListScope, Notification } from '../types/index.js';
import { NotFoundError } from '../errors.js';

export class NotificationStore {
  private notifications: Notification[] = [];

  /** Snapshot of the current sequence; records are copies. */
  list(scope: ListScope = 'all'): Notification[] {
    const source = scope === 'unread'
      ? this.notifications.filter((n) => !n.read)
      : this.notifications;
    return source.map((n) => ({ ...n }));
  }

  /** Prepend. The caller guarantees the id is unique. */
  insert(notification: Notification): void {
    this.notifications.unshift({ ...notification });
  }

  markRead(id: string): void {
    const target = this.notifications.find((n) => n.id === id);
    if (!target) {
      throw new NotFoundError(`Notification not found: ${id}`);
    }
    target.read = true;
  }

  clear(): void {
    this.notifications = [];
  }

  size(): number {
    return this.notifications.length;
  }
}
