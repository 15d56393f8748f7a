import type { Transport } from '../http/transport.js';
import type { ResourceContext } from '../client/resourceContext.js';
import type { ModelVisibility, Page } from '../types/resource.types.js';
import { modelSchema, pageSchema, parseResponse } from '../api/schemas.js';
import { FIRST_PAGE, resolveCursor, type PageCursor } from '../pagination/cursor.js';
import { compact, requireNonEmpty } from '../utils/arguments.js';
import { Model } from '../resources/model.js';
import { Versions } from './versions.js';
import { MODELS_PATH, modelPath, parseModelKey } from './modelKey.js';

export interface CreateModelOptions {
  owner: string;
  name: string;
  visibility: ModelVisibility;
  /** Hardware SKU the model runs on. */
  hardware: string;
  description?: string;
  githubUrl?: string;
  paperUrl?: string;
  licenseUrl?: string;
  coverImageUrl?: string;
}

export class Models {
  constructor(
    private readonly transport: Transport,
    private readonly context: ResourceContext,
  ) {}

  async list(cursor: PageCursor = FIRST_PAGE): Promise<Page<Model>> {
    const target = resolveCursor(cursor, MODELS_PATH);
    const data = await this.transport.request('GET', target);
    const page = parseResponse(pageSchema(modelSchema), data, 'model list');
    return {
      previous: page.previous,
      next: page.next,
      results: page.results.map(snapshot => new Model(this.context, snapshot)),
    };
  }

  /** Fetches a model by its `owner/name` key. */
  async get(key: string): Promise<Model> {
    const path = modelPath(parseModelKey(key));
    const data = await this.transport.request('GET', path);
    return new Model(this.context, parseResponse(modelSchema, data, 'model'));
  }

  async create(options: CreateModelOptions): Promise<Model> {
    const body = {
      owner: requireNonEmpty(options.owner, 'owner'),
      name: requireNonEmpty(options.name, 'name'),
      visibility: requireNonEmpty(options.visibility, 'visibility'),
      hardware: requireNonEmpty(options.hardware, 'hardware'),
      ...compact({
        description: options.description,
        github_url: options.githubUrl,
        paper_url: options.paperUrl,
        license_url: options.licenseUrl,
        cover_image_url: options.coverImageUrl,
      }),
    };

    const data = await this.transport.request('POST', MODELS_PATH, body);
    return new Model(this.context, parseResponse(modelSchema, data, 'model'));
  }

  /** Version operations scoped to the model `owner/name`. */
  versions(key: string): Versions {
    return new Versions(this.transport, this.context, parseModelKey(key));
  }
}
