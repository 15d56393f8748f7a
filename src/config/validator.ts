import type { AppConfig, LogLevel } from '../types/config.types.js';
import { InfersyncError } from '../errors/base.js';
import { LOG_LEVELS } from './defaults.js';

export class ConfigValidationError extends InfersyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_CONFIG', cause);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function validateBaseUrl(baseUrl: string): void {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (err) {
    throw new ConfigValidationError(`api.baseUrl is not a valid URL: "${baseUrl}".`, err);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigValidationError(
      `api.baseUrl must use http or https, got "${parsed.protocol}".`,
    );
  }
}

export function validateConfig(config: AppConfig): void {
  validateBaseUrl(config.api.baseUrl);

  if (!Number.isFinite(config.api.pollInterval) || config.api.pollInterval < 0) {
    throw new ConfigValidationError(
      `api.pollInterval must be a non-negative number of milliseconds, got ${config.api.pollInterval}.`,
    );
  }

  if (config.api.apiToken !== undefined && config.api.apiToken.trim() === '') {
    throw new ConfigValidationError(
      'api.apiToken is empty. Set INFERSYNC_API_TOKEN or remove the key from the config file.',
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigValidationError(
      `logLevel must be one of ${LOG_LEVELS.join(', ')}, got "${String(config.logLevel)}".`,
    );
  }
}
