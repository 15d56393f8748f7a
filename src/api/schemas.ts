import { z } from 'zod';
import type {
  ModelSnapshot,
  PredictionSnapshot,
  VersionSnapshot,
} from '../types/resource.types.js';
import { InvalidResponseError } from '../errors/request.js';

// ── Records ──────────────────────────────────────────────────────────────────

export const predictionStatusSchema = z.enum([
  'starting',
  'processing',
  'succeeded',
  'failed',
  'canceled',
]);

const optionalString = z.string().nullish();
const jsonObject = z.record(z.unknown());

export const predictionSchema = z
  .object({
    id: z.string(),
    version: z.string(),
    status: predictionStatusSchema,
    input: jsonObject.nullish(),
    output: z.unknown(),
    logs: optionalString,
    error: optionalString,
    metrics: jsonObject.nullish(),
    created_at: optionalString,
    started_at: optionalString,
    completed_at: optionalString,
    urls: z
      .object({
        get: z.string().optional(),
        cancel: z.string().optional(),
        stream: z.string().optional(),
      })
      .nullish(),
  })
  .transform(
    (r): PredictionSnapshot => ({
      id: r.id,
      version: r.version,
      status: r.status,
      input: r.input ?? null,
      output: r.output ?? null,
      logs: r.logs ?? null,
      error: r.error ?? null,
      metrics: r.metrics ?? null,
      createdAt: r.created_at ?? null,
      startedAt: r.started_at ?? null,
      completedAt: r.completed_at ?? null,
      urls: r.urls ?? null,
    }),
  );

export const versionSchema = z
  .object({
    id: z.string(),
    created_at: optionalString,
    runtime_version: optionalString,
    openapi_schema: jsonObject.nullish(),
  })
  .transform(
    (r): VersionSnapshot => ({
      id: r.id,
      createdAt: r.created_at ?? null,
      runtimeVersion: r.runtime_version ?? null,
      openapiSchema: r.openapi_schema ?? null,
    }),
  );

export const modelSchema = z
  .object({
    url: z.string(),
    owner: z.string(),
    name: z.string(),
    description: optionalString,
    visibility: z.enum(['public', 'private']),
    github_url: optionalString,
    paper_url: optionalString,
    license_url: optionalString,
    run_count: z.number().int().nonnegative().nullish(),
    cover_image_url: optionalString,
    default_example: predictionSchema.nullish(),
    latest_version: versionSchema.nullish(),
  })
  .transform(
    (r): ModelSnapshot => ({
      url: r.url,
      owner: r.owner,
      name: r.name,
      description: r.description ?? null,
      visibility: r.visibility,
      githubUrl: r.github_url ?? null,
      paperUrl: r.paper_url ?? null,
      licenseUrl: r.license_url ?? null,
      runCount: r.run_count ?? 0,
      coverImageUrl: r.cover_image_url ?? null,
      defaultExample: r.default_example ?? null,
      latestVersion: r.latest_version ?? null,
    }),
  );

// ── Pages ────────────────────────────────────────────────────────────────────

export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    previous: z.string().nullish().transform(v => v ?? null),
    next: z.string().nullish().transform(v => v ?? null),
    results: z.array(item),
  });
}

// ── Parsing ──────────────────────────────────────────────────────────────────

/** Validates a response body against `schema`, raising InvalidResponseError on mismatch. */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string,
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidResponseError(`Unexpected ${what} response: ${detail}`, result.error);
  }
  return result.data;
}
