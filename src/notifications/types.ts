/**
 * Client-side abstractions for pushing notifications into a Bellhop server.
 *
 * `NotificationChannel` is what the CLI talks to; `HttpNotificationClient`
 * is the implementation that goes through the REST gateway.
 */

import type { Notification } from '../types/index.js';

export interface NotificationPayload {
  title: string;
  message: string;
}

export interface NotificationChannel {
  publish(payload: NotificationPayload): Promise<Notification>;
}

export function isNotification(value: unknown): value is Notification {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value && typeof value.id === 'string' &&
    'title' in value && typeof value.title === 'string' &&
    'message' in value && typeof value.message === 'string' &&
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'read' in value && typeof value.read === 'boolean'
  );
}
