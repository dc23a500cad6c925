import { describe, test, expect } from 'vitest';
import { generateNotificationId, isBlank } from '../utils.js';
import { loadConfig } from '../config.js';
import { DEFAULT_CONNECTION_OPTIONS } from '../websocket/connection.js';

describe('generateNotificationId', () => {
  test('encodes the UTC time down to the millisecond', () => {
    const id = generateNotificationId(new Date('2026-01-02T03:04:05.006Z'));

    expect(id.startsWith('20260102030405-006-')).toBe(true);
    expect(id).toHaveLength(27);
  });

  test('ids from the same instant differ', () => {
    const now = new Date('2026-01-02T03:04:05.006Z');
    const ids = new Set(Array.from({ length: 50 }, () => generateNotificationId(now)));

    expect(ids.size).toBe(50);
  });
});

describe('isBlank', () => {
  test('treats missing and whitespace-only strings as blank', () => {
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank(null)).toBe(true);
    expect(isBlank(' \t')).toBe(true);
    expect(isBlank(' x ')).toBe(false);
  });
});

describe('loadConfig', () => {
  test('defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      host: '0.0.0.0',
      corsOrigin: '*',
      staticDir: undefined,
      seedNotifications: false,
      sendTimeoutMs: 5000,
      maxBufferedBytes: 1048576,
    });
  });

  test('send limits default to the live connection defaults', () => {
    const { sendTimeoutMs, maxBufferedBytes } = loadConfig({});

    expect({ sendTimeoutMs, maxBufferedBytes }).toEqual(DEFAULT_CONNECTION_OPTIONS);
  });

  test('reads overrides and ignores invalid numbers', () => {
    const config = loadConfig({
      PORT: '9090',
      CORS_ORIGIN: 'http://localhost:5173',
      STATIC_DIR: './public',
      SEED_NOTIFICATIONS: 'true',
      SEND_TIMEOUT_MS: 'soon',
      MAX_BUFFERED_BYTES: '-1',
    });

    expect(config.port).toBe(9090);
    expect(config.corsOrigin).toBe('http://localhost:5173');
    expect(config.staticDir).toBe('./public');
    expect(config.seedNotifications).toBe(true);
    expect(config.sendTimeoutMs).toBe(5000);
    expect(config.maxBufferedBytes).toBe(1048576);
  });
});
