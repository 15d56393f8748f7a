import type { Transport } from '../http/transport.js';
import type { ResourceContext } from '../client/resourceContext.js';
import type { Page } from '../types/resource.types.js';
import { pageSchema, parseResponse, versionSchema } from '../api/schemas.js';
import { FIRST_PAGE, resolveCursor, type PageCursor } from '../pagination/cursor.js';
import { requireNonEmpty } from '../utils/arguments.js';
import { Version } from '../resources/version.js';
import { modelPath, type ModelKey } from './modelKey.js';

export class Versions {
  private readonly basePath: string;
  private readonly modelKey: string;

  constructor(
    private readonly transport: Transport,
    private readonly context: ResourceContext,
    model: ModelKey,
  ) {
    this.basePath = `${modelPath(model)}/versions`;
    this.modelKey = `${model.owner}/${model.name}`;
  }

  async list(cursor: PageCursor = FIRST_PAGE): Promise<Page<Version>> {
    const target = resolveCursor(cursor, this.basePath);
    const data = await this.transport.request('GET', target);
    const page = parseResponse(pageSchema(versionSchema), data, 'version list');
    return {
      previous: page.previous,
      next: page.next,
      results: page.results.map(snapshot => new Version(this.context, this.modelKey, snapshot)),
    };
  }

  async get(id: string): Promise<Version> {
    const versionId = requireNonEmpty(id, 'version id');
    const data = await this.transport.request('GET', `${this.basePath}/${encodeURIComponent(versionId)}`);
    return new Version(this.context, this.modelKey, parseResponse(versionSchema, data, 'version'));
  }
}
