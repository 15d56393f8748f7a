import { readFileSync } from 'node:fs';
import type { PredictionInput } from '../types/resource.types.js';
import { InvalidArgumentError } from '../errors/argument.js';
import { cursorFrom, FIRST_PAGE, type PageCursor } from '../pagination/cursor.js';

// Objects, arrays, quoted strings, numbers and literals are decoded as JSON.
const JSON_VALUE = /^(?:[{["].*|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|true|false|null)$/s;

/**
 * Parses `key=value` pairs from the command line. Values are read as JSON
 * when they look like JSON and as plain strings otherwise; `key=@path` reads
 * the file's bytes.
 */
export function parseInputs(
  pairs: string[],
  readFile: (path: string) => Uint8Array = path => readFileSync(path),
): PredictionInput {
  const input: PredictionInput = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new InvalidArgumentError(`Invalid input "${pair}": expected key=value`);
    }
    const key = pair.slice(0, eq);
    const raw = pair.slice(eq + 1);

    if (raw.startsWith('@')) {
      input[key] = readFile(raw.slice(1));
      continue;
    }

    if (!JSON_VALUE.test(raw)) {
      input[key] = raw;
      continue;
    }
    try {
      const value: unknown = JSON.parse(raw);
      input[key] = value;
    } catch (err) {
      throw new InvalidArgumentError(`Input "${key}" is not valid JSON: ${raw}`, err);
    }
  }
  return input;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function cursorOption(cursor: string | undefined): PageCursor {
  return cursor === undefined ? FIRST_PAGE : cursorFrom(cursor);
}

// AbortSignal.timeout takes a whole number of ms that fits in 32 bits.
const MAX_TIMEOUT_MS = 2 ** 32 - 1;

/** Converts a `--timeout <seconds>` value to whole milliseconds. */
export function timeoutMs(seconds: string): number {
  const value = Number(seconds);
  if (seconds.trim() === '' || !Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError('--timeout must be a positive number of seconds');
  }
  return Math.min(Math.ceil(value * 1000), MAX_TIMEOUT_MS);
}

export function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}
