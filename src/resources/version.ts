import type { ResourceContext } from '../client/resourceContext.js';
import type { VersionSnapshot } from '../types/resource.types.js';
import { InvalidArgumentError } from '../errors/argument.js';

export class Version {
  private state: VersionSnapshot;

  constructor(
    private readonly context: ResourceContext,
    /** `owner/name` of the model this version belongs to. */
    readonly modelKey: string,
    snapshot: VersionSnapshot,
  ) {
    this.state = snapshot;
  }

  get id(): string { return this.state.id; }
  get createdAt(): string | null { return this.state.createdAt; }
  get runtimeVersion(): string | null { return this.state.runtimeVersion; }
  get openapiSchema(): Record<string, unknown> | null { return this.state.openapiSchema; }

  applySnapshot(snapshot: VersionSnapshot): void {
    if (snapshot.id !== this.state.id) {
      throw new InvalidArgumentError(
        `Cannot apply snapshot of version ${snapshot.id} to version ${this.state.id}`,
      );
    }
    this.state = snapshot;
  }

  async reload(): Promise<void> {
    const fresh = await this.context.models.versions(this.modelKey).get(this.id);
    this.applySnapshot(fresh.toJSON());
  }

  toJSON(): VersionSnapshot {
    return this.state;
  }
}
