import type { Progress } from '../types/resource.types.js';

// "42% |█████     | 42/100 [00:04<00:05, 9.8it/s]"
const PROGRESS_LINE = /^\s*(\d+)%\s*\|.+?\|\s*(\d+)\/(\d+)/;
const PROGRESS_ANYWHERE = /(\d+)%\s*\|.+?\|\s*(\d+)\/(\d+)/g;

/**
 * Reads the most recent progress-bar line out of a prediction's logs.
 * Lines are scanned from the end; a line holding more than one bar is
 * ambiguous and skipped. Returns undefined when nothing matches.
 */
export function parseProgress(logs: string): Progress | undefined {
  if (logs === '') return undefined;

  const lines = logs.split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = (lines[i] ?? '').trim();
    const match = PROGRESS_LINE.exec(line);
    if (!match) continue;

    if ((line.match(PROGRESS_ANYWHERE) ?? []).length !== 1) continue;

    const [, percentage = '0', current = '0', total = '0'] = match;
    return {
      percentage: parseInt(percentage, 10) / 100,
      current: parseInt(current, 10),
      total: parseInt(total, 10),
    };
  }

  return undefined;
}
