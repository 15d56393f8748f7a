import type { AppConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './defaults.js';
import { ConfigValidationError, isLogLevel } from './validator.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

const fileConfigSchema = z
  .object({
    api: z
      .object({
        baseUrl: z.string(),
        apiToken: z.string(),
        pollInterval: z.number(),
        userAgent: z.string(),
      })
      .partial()
      .optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

type ConfigOverrides = z.infer<typeof fileConfigSchema>;

function mergeConfig(base: AppConfig, override: ConfigOverrides): AppConfig {
  const apiToken = override.api?.apiToken ?? base.api.apiToken;
  return {
    api: {
      baseUrl: override.api?.baseUrl ?? base.api.baseUrl,
      pollInterval: override.api?.pollInterval ?? base.api.pollInterval,
      userAgent: override.api?.userAgent ?? base.api.userAgent,
      ...(apiToken !== undefined && { apiToken }),
    },
    logLevel: override.logLevel ?? base.logLevel,
  };
}

function loadFileConfig(cwd: string): ConfigOverrides {
  const candidates = [
    join(cwd, '.infersync.json'),
    join(cwd, 'infersync.config.json'),
  ];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(candidate, 'utf-8'));
    } catch (err) {
      throw new ConfigValidationError(`Could not parse ${candidate} as JSON.`, err);
    }

    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigValidationError(
        `Invalid config in ${candidate}: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`,
        parsed.error,
      );
    }
    return parsed.data;
  }
  return {};
}

function loadEnvOverrides(): ConfigOverrides {
  const api: NonNullable<ConfigOverrides['api']> = {};

  const apiToken = process.env['INFERSYNC_API_TOKEN'];
  if (apiToken) api.apiToken = apiToken;

  const baseUrl = process.env['INFERSYNC_BASE_URL'];
  if (baseUrl) api.baseUrl = baseUrl;

  const pollInterval = process.env['INFERSYNC_POLL_INTERVAL'];
  if (pollInterval) {
    const ms = Number(pollInterval);
    if (!Number.isFinite(ms) || ms < 0) {
      throw new ConfigValidationError(
        `INFERSYNC_POLL_INTERVAL must be a non-negative number of milliseconds, got "${pollInterval}".`,
      );
    }
    api.pollInterval = ms;
  }

  const overrides: ConfigOverrides = { api };

  const logLevel = process.env['INFERSYNC_LOG_LEVEL'];
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigValidationError(
        `INFERSYNC_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}".`,
      );
    }
    overrides.logLevel = logLevel;
  }

  return overrides;
}

export function loadConfig(cwd: string = process.cwd()): AppConfig {
  const fileConfig = loadFileConfig(cwd);
  const envOverrides = loadEnvOverrides();

  let config = mergeConfig(DEFAULT_CONFIG, fileConfig);
  config = mergeConfig(config, envOverrides);

  return config;
}
