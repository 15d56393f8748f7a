import { InfersyncError } from './base.js';

export class OperationAbortedError extends InfersyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ABORTED', cause);
  }
}
