/**
 * Wire protocol for live connections: JSON text frames.
 *
 * client -> server: get_notifications | mark_read | clear_all
 * server -> client: notification | notifications_list
 *
 * There is no error frame. Invalid requests and unknown types are logged
 * server-side only.
 */

import type { NotificationService } from '../services/notification-service.js';
import type { LiveConnection, Logger, Notification } from '../types/index.js';
import { errorMessage } from '../errors.js';

const CLIENT_FRAME_TYPES = ['get_notifications', 'mark_read', 'clear_all'] as const;

export type ClientFrameType = (typeof CLIENT_FRAME_TYPES)[number];

export function isClientFrameType(type: string | undefined): type is ClientFrameType {
  return CLIENT_FRAME_TYPES.some((known) => known === type);
}

export interface ClientFrame {
  type?: string;
  notification_id?: string;
}

export type ServerFrame =
  | { type: 'notification'; notification: Notification }
  | { type: 'notifications_list'; notifications: Notification[] };

export type DecodeResult =
  | { ok: true; frame: ClientFrame }
  | { ok: false; reason: string };

/** Open keeps the connection; close means the frame was fatal to it. */
export type FrameOutcome = 'open' | 'close';

export function encodeFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}

export function decodeFrame(raw: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(error)}` };
  }

  // A bare null reads as an empty frame (unknown type), not a malformed one.
  if (parsed === null) {
    return { ok: true, frame: {} };
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { ok: false, reason: 'frame must be a JSON object' };
  }

  const frame: ClientFrame = {};
  if ('type' in parsed && parsed.type !== undefined && parsed.type !== null) {
    if (typeof parsed.type !== 'string') {
      return { ok: false, reason: '"type" must be a string' };
    }
    frame.type = parsed.type;
  }
  if ('notification_id' in parsed && parsed.notification_id !== undefined && parsed.notification_id !== null) {
    if (typeof parsed.notification_id !== 'string') {
      return { ok: false, reason: '"notification_id" must be a string' };
    }
    frame.notification_id = parsed.notification_id;
  }

  return { ok: true, frame };
}

export class ProtocolHandler {
  private service: NotificationService;
  private logger: Logger;

  constructor(service: NotificationService, logger: Logger = console) {
    this.service = service;
    this.logger = logger;
  }

  /**
   * Handle one inbound frame. Never rejects: service failures are logged,
   * and a malformed frame or a failed reply write yields 'close'.
   */
  async handle(conn: LiveConnection, raw: string): Promise<FrameOutcome> {
    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      this.logger.warn(`[ws ${conn.id}] Malformed frame: ${decoded.reason}`);
      return 'close';
    }

    const { frame } = decoded;
    if (!isClientFrameType(frame.type)) {
      this.logger.warn(`[ws ${conn.id}] Unknown message type: ${frame.type ?? '(none)'}`);
      return 'open';
    }

    const type: ClientFrameType = frame.type;
    switch (type) {
      case 'get_notifications': {
        const reply = encodeFrame({
          type: 'notifications_list',
          notifications: this.service.listUnread(),
        });
        try {
          await conn.send(reply);
        } catch (error) {
          this.logger.error(`[ws ${conn.id}] Failed to send notifications list:`, errorMessage(error));
          return 'close';
        }
        return 'open';
      }

      case 'mark_read': {
        const id = frame.notification_id ?? '';
        try {
          this.service.markRead(id);
          this.logger.log(`[ws ${conn.id}] Marked notification ${id} as read`);
        } catch (error) {
          this.logger.error(`[ws ${conn.id}] mark_read failed:`, errorMessage(error));
        }
        return 'open';
      }

      case 'clear_all': {
        this.service.clearAll();
        this.logger.log(`[ws ${conn.id}] Cleared all notifications`);
        return 'open';
      }
    }
  }
}
