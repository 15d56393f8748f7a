import type { ResourceContext } from '../client/resourceContext.js';
import type {
  PredictionInput,
  PredictionSnapshot,
  PredictionStatus,
  PredictionUrls,
  Progress,
  TerminalStatus,
} from '../types/resource.types.js';
import { parseProgress } from '../progress/progress.js';
import { InvalidArgumentError } from '../errors/argument.js';
import { ModelError } from '../errors/model.js';
import { sleep } from '../utils/sleep.js';

export interface PollOptions {
  /** Stops polling with an OperationAbortedError, e.g. `AbortSignal.timeout(60_000)`. */
  signal?: AbortSignal;
}

const TERMINAL_STATUSES: ReadonlySet<PredictionStatus> = new Set<PredictionStatus>([
  'succeeded',
  'failed',
  'canceled',
]);

export function isTerminal(status: PredictionStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Remembers how much of a growing output has been handed out. Lists yield
 * their new elements; text yields the suffix appended since the last read.
 * Any other value, or text that was rewritten rather than extended, is
 * yielded whole once the prediction is final.
 */
class OutputTail {
  private count = 0;
  private text = '';

  take(output: unknown, final: boolean): unknown[] {
    if (output === null || output === undefined) return [];
    if (Array.isArray(output)) {
      const fresh = output.slice(this.count);
      this.count = Math.max(this.count, output.length);
      return fresh;
    }
    if (typeof output === 'string') {
      if (output.startsWith(this.text)) {
        const fresh = output.slice(this.text.length);
        this.text = output;
        return fresh === '' ? [] : [fresh];
      }
      if (!final) return [];
      this.text = output;
      return [output];
    }
    return final ? [output] : [];
  }
}

export class Prediction {
  private state: PredictionSnapshot;

  constructor(
    private readonly context: ResourceContext,
    snapshot: PredictionSnapshot,
  ) {
    this.state = snapshot;
  }

  get id(): string { return this.state.id; }
  get version(): string { return this.state.version; }
  get status(): PredictionStatus { return this.state.status; }
  get input(): PredictionInput | null { return this.state.input; }
  get output(): unknown { return this.state.output; }
  get logs(): string | null { return this.state.logs; }
  get error(): string | null { return this.state.error; }
  get metrics(): Record<string, unknown> | null { return this.state.metrics; }
  get createdAt(): string | null { return this.state.createdAt; }
  get startedAt(): string | null { return this.state.startedAt; }
  get completedAt(): string | null { return this.state.completedAt; }
  get urls(): PredictionUrls | null { return this.state.urls; }

  /** Latest progress-bar reading in the logs, if any. */
  get progress(): Progress | undefined {
    if (!this.state.logs) return undefined;
    return parseProgress(this.state.logs);
  }

  /**
   * Replaces every field with those of `snapshot`. References to this object
   * stay valid and observe the new state.
   */
  applySnapshot(snapshot: PredictionSnapshot): void {
    if (snapshot.id !== this.state.id) {
      throw new InvalidArgumentError(
        `Cannot apply snapshot of prediction ${snapshot.id} to prediction ${this.state.id}`,
      );
    }
    this.state = snapshot;
  }

  async reload(): Promise<void> {
    const fresh = await this.context.predictions.get(this.id);
    this.applySnapshot(fresh.toJSON());
  }

  async cancel(): Promise<void> {
    const canceled = await this.context.predictions.cancel(this.id);
    this.applySnapshot(canceled.toJSON());
  }

  /**
   * Reloads every `pollInterval` ms until the status is terminal. Does not
   * throw when the prediction failed; inspect `status` and `error`.
   */
  async wait(options: PollOptions = {}): Promise<void> {
    while (!isTerminal(this.status)) {
      await sleep(this.context.pollInterval, options.signal);
      await this.reload();
    }
  }

  /**
   * Yields output as the server appends it: new list elements, or the text
   * added to a string output. Once the prediction is terminal the remainder
   * is yielded, and a failed prediction then throws a ModelError.
   */
  async *outputIterator(options: PollOptions = {}): AsyncGenerator<unknown, void, undefined> {
    const tail = new OutputTail();

    while (!isTerminal(this.status)) {
      yield* tail.take(this.output, false);

      await sleep(this.context.pollInterval, options.signal);
      await this.reload();
    }

    yield* tail.take(this.output, true);

    if (this.status === 'failed') {
      throw new ModelError(this.error ?? `Prediction ${this.id} failed`, this.id);
    }
  }

  toJSON(): PredictionSnapshot {
    return this.state;
  }
}
