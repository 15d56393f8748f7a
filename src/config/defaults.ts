import type { AppConfig } from '../types/config.types.js';

export const DEFAULT_CONFIG: AppConfig = {
  api: {
    baseUrl: 'https://api.infersync.dev',
    pollInterval: 500,
    userAgent: 'infersync-js',
  },
  logLevel: 'info',
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
