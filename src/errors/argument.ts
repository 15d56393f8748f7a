import { InfersyncError } from './base.js';

/** Caller misuse, raised before any request is sent. */
export class InvalidArgumentError extends InfersyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_ARGUMENT', cause);
  }
}
