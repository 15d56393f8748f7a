import { InvalidArgumentError } from '../errors/argument.js';

export function requireNonEmpty(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidArgumentError(`${name} is required`);
  }
  return value;
}

/** Copies `fields` without the keys whose value is undefined or null. */
export function compact(fields: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && value !== null) {
      result[key] = value;
    }
  }
  return result;
}
