import { setTimeout as delay } from 'node:timers/promises';
import { OperationAbortedError } from '../errors/aborted.js';

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) {
      throw new OperationAbortedError('Polling was aborted', signal.reason);
    }
    throw err;
  }
}
