export { InfersyncError } from './base.js';
export { InvalidArgumentError } from './argument.js';
export { RequestError, NotFoundError, InvalidResponseError } from './request.js';
export { ModelError } from './model.js';
export { OperationAbortedError } from './aborted.js';
