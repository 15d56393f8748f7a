// Public API — explicit named exports only (no re-export *)

export type {
  Page,
  PredictionInput,
  PredictionSnapshot,
  PredictionStatus,
  PredictionUrls,
  ModelSnapshot,
  ModelVisibility,
  Progress,
  TerminalStatus,
  VersionSnapshot,
} from './types/resource.types.js';
export type { AppConfig, ApiConfig, LogLevel } from './types/config.types.js';
export type { Transport, HttpMethod } from './http/transport.js';
export type { ResourceContext } from './client/resourceContext.js';
export type { CreateModelOptions } from './namespaces/models.js';
export type { CreatePredictionOptions, WebhookEvent } from './namespaces/predictions.js';
export type { PollOptions } from './resources/prediction.js';
export type { FileUploader } from './encoding/encodeInput.js';
export type { Logger } from './logging/logger.js';

export { Client, parseVersionRef, type ClientOptions, type RunOptions } from './client/client.js';
export { Models } from './namespaces/models.js';
export { Versions } from './namespaces/versions.js';
export { Predictions } from './namespaces/predictions.js';
export { parseModelKey } from './namespaces/modelKey.js';
export { Model } from './resources/model.js';
export { Version } from './resources/version.js';
export { Prediction, isTerminal } from './resources/prediction.js';
export { parseProgress } from './progress/progress.js';
export { FIRST_PAGE, cursorFrom, paginate, type PageCursor } from './pagination/index.js';
export { encodeInput, toDataUri } from './encoding/encodeInput.js';
export { HttpTransport, type HttpTransportOptions } from './http/httpTransport.js';
export { createLogger } from './logging/logger.js';
export { loadConfig } from './config/loader.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export {
  InfersyncError,
  InvalidArgumentError,
  RequestError,
  NotFoundError,
  InvalidResponseError,
  ModelError,
  OperationAbortedError,
} from './errors/index.js';
