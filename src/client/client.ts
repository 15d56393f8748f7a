import type { AppConfig, LogLevel } from '../types/config.types.js';
import type { PredictionInput } from '../types/resource.types.js';
import type { Transport } from '../http/transport.js';
import type { ResourceContext } from './resourceContext.js';
import type { FileUploader } from '../encoding/encodeInput.js';
import type { PollOptions } from '../resources/prediction.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { validateConfig } from '../config/validator.js';
import { HttpTransport } from '../http/httpTransport.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { Models } from '../namespaces/models.js';
import { Predictions, type CreatePredictionOptions } from '../namespaces/predictions.js';
import { parseModelKey } from '../namespaces/modelKey.js';
import { InvalidArgumentError } from '../errors/argument.js';
import { ModelError } from '../errors/model.js';

export interface ClientOptions {
  apiToken?: string;
  baseUrl?: string;
  /** Milliseconds between reloads while polling a prediction. */
  pollInterval?: number;
  userAgent?: string;
  logLevel?: LogLevel;
  logger?: Logger;
  /** Replaces the fetch-based transport, e.g. in tests. */
  transport?: Transport;
  fileUploader?: FileUploader;
}

export interface RunOptions extends CreatePredictionOptions, PollOptions {}

/**
 * Returns the version id named by `ref`, which is either `owner/name:version`
 * or a bare version id.
 */
export function parseVersionRef(ref: string): string {
  const colon = ref.lastIndexOf(':');
  if (colon === -1) {
    if (ref.trim() === '') {
      throw new InvalidArgumentError('A version reference is required');
    }
    return ref;
  }

  parseModelKey(ref.slice(0, colon));
  const version = ref.slice(colon + 1);
  if (version === '') {
    throw new InvalidArgumentError(
      `"${ref}" does not name a version: expected "owner/name:version" or a version id`,
    );
  }
  return version;
}

export class Client implements ResourceContext {
  readonly models: Models;
  readonly predictions: Predictions;
  readonly pollInterval: number;
  readonly logger: Logger;

  constructor(options: ClientOptions = {}) {
    const defaults = DEFAULT_CONFIG.api;
    const pollInterval = options.pollInterval ?? defaults.pollInterval;
    if (!Number.isFinite(pollInterval) || pollInterval < 0) {
      throw new InvalidArgumentError(`pollInterval must be a non-negative number, got ${pollInterval}`);
    }

    this.pollInterval = pollInterval;
    this.logger = options.logger ?? createLogger(options.logLevel ?? DEFAULT_CONFIG.logLevel);

    const transport =
      options.transport ??
      new HttpTransport({
        baseUrl: options.baseUrl ?? defaults.baseUrl,
        userAgent: options.userAgent ?? defaults.userAgent,
        logger: this.logger,
        ...(options.apiToken !== undefined && { apiToken: options.apiToken }),
      });

    this.models = new Models(transport, this);
    this.predictions = new Predictions(transport, this, options.fileUploader);
  }

  static fromConfig(
    config: AppConfig,
    extra: Pick<ClientOptions, 'transport' | 'fileUploader' | 'logger'> = {},
  ): Client {
    validateConfig(config);
    return new Client({
      baseUrl: config.api.baseUrl,
      pollInterval: config.api.pollInterval,
      userAgent: config.api.userAgent,
      logLevel: config.logLevel,
      ...(config.api.apiToken !== undefined && { apiToken: config.api.apiToken }),
      ...extra,
    });
  }

  /**
   * Creates a prediction, waits for it to finish and returns its output.
   * Throws a ModelError when the prediction fails.
   */
  async run(ref: string, input: PredictionInput, options: RunOptions = {}): Promise<unknown> {
    const { signal, ...createOptions } = options;
    const prediction = await this.predictions.create(parseVersionRef(ref), input, createOptions);

    await prediction.wait({ signal });

    if (prediction.status === 'failed') {
      throw new ModelError(prediction.error ?? `Prediction ${prediction.id} failed`, prediction.id);
    }
    return prediction.output;
  }
}
