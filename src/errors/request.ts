import { InfersyncError } from './base.js';

export class RequestError extends InfersyncError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    cause?: unknown,
    code = 'REQUEST_ERROR',
  ) {
    super(message, code, cause);
  }
}

export class NotFoundError extends RequestError {
  constructor(message: string, body?: string) {
    super(message, 404, body, undefined, 'NOT_FOUND');
  }
}

export class InvalidResponseError extends InfersyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_RESPONSE', cause);
  }
}
