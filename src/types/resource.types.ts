export type PredictionStatus = 'starting' | 'processing' | 'succeeded' | 'failed' | 'canceled';

export type TerminalStatus = Extract<PredictionStatus, 'succeeded' | 'failed' | 'canceled'>;

export type PredictionInput = Record<string, unknown>;

export interface PredictionUrls {
  get?: string;
  cancel?: string;
  stream?: string;
}

export interface PredictionSnapshot {
  readonly id: string;
  readonly version: string;
  readonly status: PredictionStatus;
  readonly input: PredictionInput | null;
  readonly output: unknown;
  readonly logs: string | null;
  readonly error: string | null;
  readonly metrics: Record<string, unknown> | null;
  readonly createdAt: string | null;
  readonly startedAt: string | null;
  readonly completedAt: string | null;
  readonly urls: PredictionUrls | null;
}

export interface VersionSnapshot {
  readonly id: string;
  readonly createdAt: string | null;
  readonly runtimeVersion: string | null;
  readonly openapiSchema: Record<string, unknown> | null;
}

export type ModelVisibility = 'public' | 'private';

export interface ModelSnapshot {
  readonly url: string;
  readonly owner: string;
  readonly name: string;
  readonly description: string | null;
  readonly visibility: ModelVisibility;
  readonly githubUrl: string | null;
  readonly paperUrl: string | null;
  readonly licenseUrl: string | null;
  readonly runCount: number;
  readonly coverImageUrl: string | null;
  readonly defaultExample: PredictionSnapshot | null;
  readonly latestVersion: VersionSnapshot | null;
}

export interface Progress {
  /** Fraction complete, 0.0 to 1.0. */
  percentage: number;
  current: number;
  total: number;
}

export interface Page<T> {
  previous: string | null;
  next: string | null;
  results: T[];
}
