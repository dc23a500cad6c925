import { v4 as uuidv4 } from 'uuid';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Time-derived notification id: `YYYYMMDDHHmmss-SSS-xxxxxxxx` (UTC).
 * The random suffix keeps ids created in the same millisecond distinct.
 */
export function generateNotificationId(now: Date = new Date()): string {
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${stamp}-${pad(now.getUTCMilliseconds(), 3)}-${uuidv4().slice(0, 8)}`;
}

export function isBlank(value: string | undefined | null): boolean {
  return value === undefined || value === null || value.trim() === '';
}
