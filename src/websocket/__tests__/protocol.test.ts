import { describe, test, expect, beforeEach } from 'vitest';
import { NotificationStore } from '../../db/store.js';
import { NotificationService } from '../../services/notification-service.js';
import { ProtocolHandler, decodeFrame, encodeFrame, isClientFrameType } from '../protocol.js';
import { FakeConnection, createTestLogger, type TestLogger } from '../../__tests__/harness.js';

describe('decodeFrame', () => {
  test('accepts known frames and ignores extra fields', () => {
    expect(decodeFrame('{"type":"get_notifications"}')).toEqual({
      ok: true,
      frame: { type: 'get_notifications' },
    });
    expect(decodeFrame('{"type":"mark_read","notification_id":"abc"}')).toEqual({
      ok: true,
      frame: { type: 'mark_read', notification_id: 'abc' },
    });
    expect(decodeFrame('{"type":"clear_all","extra":1}')).toEqual({
      ok: true,
      frame: { type: 'clear_all' },
    });
  });

  test('an object without a type decodes to an empty frame', () => {
    expect(decodeFrame('{}')).toEqual({ ok: true, frame: {} });
  });

  test('a JSON null decodes to an empty frame', () => {
    expect(decodeFrame('null')).toEqual({ ok: true, frame: {} });
    expect(decodeFrame('{"type":null,"notification_id":null}')).toEqual({ ok: true, frame: {} });
  });

  test.each([
    'not json',
    '{"type":',
    '[1,2]',
    '"get_notifications"',
    '42',
    '{"type":5}',
    '{"type":"mark_read","notification_id":7}',
  ])('rejects %s', (raw) => {
    expect(decodeFrame(raw).ok).toBe(false);
  });
});

describe('isClientFrameType', () => {
  test('recognizes exactly the three request types', () => {
    expect(['get_notifications', 'mark_read', 'clear_all'].every(isClientFrameType)).toBe(true);
    expect(isClientFrameType('subscribe')).toBe(false);
    expect(isClientFrameType(undefined)).toBe(false);
  });
});

describe('encodeFrame', () => {
  test('serializes server frames as JSON', () => {
    expect(encodeFrame({ type: 'notifications_list', notifications: [] })).toBe(
      '{"type":"notifications_list","notifications":[]}',
    );
  });
});

describe('ProtocolHandler', () => {
  let service: NotificationService;
  let logger: TestLogger;
  let handler: ProtocolHandler;
  let conn: FakeConnection;

  beforeEach(() => {
    let counter = 0;
    service = new NotificationService(new NotificationStore(), {
      generateId: () => `n-${++counter}`,
    });
    logger = createTestLogger();
    handler = new ProtocolHandler(service, logger);
    conn = new FakeConnection('c1');
  });

  test('get_notifications replies with the unread list on the same connection', async () => {
    const older = service.create('older', 'a');
    const newer = service.create('newer', 'b');
    const read = service.create('read', 'c');
    service.markRead(read.id);

    const outcome = await handler.handle(conn, '{"type":"get_notifications"}');

    expect(outcome).toBe('open');
    expect(conn.frames()).toEqual([
      { type: 'notifications_list', notifications: [newer, older] },
    ]);
  });

  test('get_notifications on an empty store sends an empty list', async () => {
    await handler.handle(conn, '{"type":"get_notifications"}');

    expect(conn.sent).toEqual(['{"type":"notifications_list","notifications":[]}']);
  });

  test('mark_read marks the record and sends nothing back', async () => {
    const created = service.create('t', 'm');

    const outcome = await handler.handle(
      conn,
      JSON.stringify({ type: 'mark_read', notification_id: created.id }),
    );

    expect(outcome).toBe('open');
    expect(service.listUnread()).toEqual([]);
    expect(conn.sent).toEqual([]);
    expect(logger.log).toHaveBeenCalledWith('[ws c1] Marked notification n-1 as read');
  });

  test('mark_read without an id is logged, not answered', async () => {
    service.create('t', 'm');

    const outcome = await handler.handle(conn, '{"type":"mark_read"}');

    expect(outcome).toBe('open');
    expect(conn.sent).toEqual([]);
    expect(service.listUnread()).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith('[ws c1] mark_read failed:', 'notification ID is required');
  });

  test('mark_read with an unknown id is logged, not answered', async () => {
    const outcome = await handler.handle(conn, '{"type":"mark_read","notification_id":"nope"}');

    expect(outcome).toBe('open');
    expect(conn.sent).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith('[ws c1] mark_read failed:', 'Notification not found: nope');
  });

  test('clear_all empties the store and sends nothing back', async () => {
    service.create('a', 'a');
    service.create('b', 'b');

    const outcome = await handler.handle(conn, '{"type":"clear_all"}');

    expect(outcome).toBe('open');
    expect(service.listAll()).toEqual([]);
    expect(conn.sent).toEqual([]);
  });

  test('unknown types are logged only and keep the connection open', async () => {
    service.create('a', 'a');

    expect(await handler.handle(conn, '{"type":"subscribe"}')).toBe('open');
    expect(await handler.handle(conn, '{}')).toBe('open');

    expect(conn.sent).toEqual([]);
    expect(service.listUnread()).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith('[ws c1] Unknown message type: subscribe');
    expect(logger.warn).toHaveBeenCalledWith('[ws c1] Unknown message type: (none)');
  });

  test('a null frame is an unknown type and keeps the connection open', async () => {
    expect(await handler.handle(conn, 'null')).toBe('open');

    expect(conn.sent).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('[ws c1] Unknown message type: (none)');
  });

  test('a malformed frame closes the connection', async () => {
    service.create('a', 'a');

    const outcome = await handler.handle(conn, '{"type":"clear_all"');

    expect(outcome).toBe('close');
    expect(service.listAll()).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  test('a failed reply write closes the connection', async () => {
    const dead = new FakeConnection('dead', true);

    const outcome = await handler.handle(dead, '{"type":"get_notifications"}');

    expect(outcome).toBe('close');
    expect(logger.error).toHaveBeenCalledWith(
      '[ws dead] Failed to send notifications list:',
      'write to dead failed',
    );
  });
});
