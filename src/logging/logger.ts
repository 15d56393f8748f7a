import type { LogLevel } from '../types/config.types.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  process.stderr.write(line);
};

/**
 * Levelled logger writing `[infersync] LEVEL message` lines to stderr.
 * stdout is left to CLI output.
 */
export function createLogger(level: LogLevel = 'info', sink: LogSink = stderrSink): Logger {
  const threshold = LEVEL_RANK[level];
  const emit = (at: LogLevel, message: string): void => {
    if (LEVEL_RANK[at] < threshold) return;
    sink(`[infersync] ${at.toUpperCase()} ${message}\n`);
  };

  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  };
}
