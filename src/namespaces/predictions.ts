import type { Transport } from '../http/transport.js';
import type { ResourceContext } from '../client/resourceContext.js';
import type { Page, PredictionInput } from '../types/resource.types.js';
import { pageSchema, parseResponse, predictionSchema } from '../api/schemas.js';
import { FIRST_PAGE, resolveCursor, type PageCursor } from '../pagination/cursor.js';
import { encodeInput, isPlainObject, toDataUri, type FileUploader } from '../encoding/encodeInput.js';
import { InvalidArgumentError } from '../errors/argument.js';
import { compact, requireNonEmpty } from '../utils/arguments.js';
import { Prediction } from '../resources/prediction.js';
import { Version } from '../resources/version.js';

const PREDICTIONS_PATH = '/v1/predictions';

export type WebhookEvent = 'start' | 'output' | 'logs' | 'completed';

export interface CreatePredictionOptions {
  /** URL that receives a POST with the prediction on each update. */
  webhook?: string;
  /** URL that receives a POST once the prediction completes. */
  webhookCompleted?: string;
  webhookEventsFilter?: WebhookEvent[];
  /** Ask the server to prepare a stream URL for the output. */
  stream?: boolean;
}

export class Predictions {
  constructor(
    private readonly transport: Transport,
    private readonly context: ResourceContext,
    private readonly upload: FileUploader = toDataUri,
  ) {}

  async list(cursor: PageCursor = FIRST_PAGE): Promise<Page<Prediction>> {
    const target = resolveCursor(cursor, PREDICTIONS_PATH);
    const data = await this.transport.request('GET', target);
    const page = parseResponse(pageSchema(predictionSchema), data, 'prediction list');
    return {
      previous: page.previous,
      next: page.next,
      results: page.results.map(snapshot => new Prediction(this.context, snapshot)),
    };
  }

  async get(id: string): Promise<Prediction> {
    const path = `${PREDICTIONS_PATH}/${encodeURIComponent(requireNonEmpty(id, 'prediction id'))}`;
    const data = await this.transport.request('GET', path);
    return new Prediction(this.context, parseResponse(predictionSchema, data, 'prediction'));
  }

  async create(
    version: Version | string,
    input: PredictionInput,
    options: CreatePredictionOptions = {},
  ): Promise<Prediction> {
    const versionId = requireNonEmpty(version instanceof Version ? version.id : version, 'version');
    if (!isPlainObject(input)) {
      throw new InvalidArgumentError('input must be an object of named inputs');
    }

    const body = {
      version: versionId,
      input: await encodeInput(input, this.upload),
      ...compact({
        webhook: options.webhook,
        webhook_completed: options.webhookCompleted,
        webhook_events_filter: options.webhookEventsFilter,
        stream: options.stream,
      }),
    };

    const data = await this.transport.request('POST', PREDICTIONS_PATH, body);
    return new Prediction(this.context, parseResponse(predictionSchema, data, 'prediction'));
  }

  /** Asks the server to cancel; whatever it returns is taken as the new state. */
  async cancel(id: string): Promise<Prediction> {
    const path = `${PREDICTIONS_PATH}/${encodeURIComponent(requireNonEmpty(id, 'prediction id'))}/cancel`;
    const data = await this.transport.request('POST', path);
    return new Prediction(this.context, parseResponse(predictionSchema, data, 'prediction'));
  }
}
