import { InfersyncError } from './base.js';

/** A prediction finished with status `failed`. */
export class ModelError extends InfersyncError {
  constructor(
    message: string,
    public readonly predictionId: string,
  ) {
    super(message, 'MODEL_ERROR');
  }
}
