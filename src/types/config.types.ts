export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ApiConfig {
  baseUrl: string;
  apiToken?: string;
  /** Milliseconds between reloads while waiting on a prediction. */
  pollInterval: number;
  userAgent: string;
}

export interface AppConfig {
  api: ApiConfig;
  logLevel: LogLevel;
}
