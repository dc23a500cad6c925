export type NotificationErrorCode = 'INVALID_ARGUMENT' | 'NOT_FOUND' | 'CONNECTION_FAILURE';

export class NotificationError extends Error {
  readonly code: NotificationErrorCode;

  constructor(code: NotificationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidArgumentError extends NotificationError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class NotFoundError extends NotificationError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

/** A write or read on a live connection failed; never surfaced to clients. */
export class ConnectionFailureError extends NotificationError {
  constructor(message: string) {
    super('CONNECTION_FAILURE', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
