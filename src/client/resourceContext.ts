import type { Models } from '../namespaces/models.js';
import type { Predictions } from '../namespaces/predictions.js';

/**
 * Handle a resource keeps on the client that produced it, used for
 * follow-up calls such as `reload`, `wait` and `cancel`. Resources never own it.
 */
export interface ResourceContext {
  readonly models: Models;
  readonly predictions: Predictions;
  /** Milliseconds between reloads while polling a prediction. */
  readonly pollInterval: number;
}
