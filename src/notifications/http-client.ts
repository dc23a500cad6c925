/**
 * HTTP-based notification client.
 *
 * POSTs to the server's /api/notifications endpoint, which stores the
 * notification and broadcasts it to every connected client. Times out
 * after 5s.
 */

import type { Notification } from '../types/index.js';
import { isNotification, type NotificationChannel, type NotificationPayload } from './types.js';

export const DEFAULT_HOST = 'http://localhost:8080';

export class HttpNotificationClient implements NotificationChannel {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(baseUrl?: string, timeoutMs = 5000) {
    this.baseUrl = (baseUrl || DEFAULT_HOST).replace(/\/$/, '');
    this.timeoutMs = timeoutMs;
  }

  async publish(payload: NotificationPayload): Promise<Notification> {
    const res = await fetch(`${this.baseUrl}/api/notifications`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const body = await res.text();
    if (res.status !== 201) {
      throw new Error(body || `HTTP ${res.status}`);
    }

    const created: unknown = JSON.parse(body);
    if (!isNotification(created)) {
      throw new Error(`Unexpected response: ${body}`);
    }
    return created;
  }
}
