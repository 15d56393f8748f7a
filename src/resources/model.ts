import type { ResourceContext } from '../client/resourceContext.js';
import type { ModelSnapshot, ModelVisibility } from '../types/resource.types.js';
import type { Versions } from '../namespaces/versions.js';
import { InvalidArgumentError } from '../errors/argument.js';
import { Prediction } from './prediction.js';
import { Version } from './version.js';

export class Model {
  private state: ModelSnapshot;
  private example: Prediction | null;
  private latest: Version | null;

  constructor(
    private readonly context: ResourceContext,
    snapshot: ModelSnapshot,
  ) {
    this.state = snapshot;
    this.example = this.wrapExample(snapshot);
    this.latest = this.wrapLatestVersion(snapshot);
  }

  /** `owner/name` */
  get id(): string { return `${this.state.owner}/${this.state.name}`; }
  get url(): string { return this.state.url; }
  get owner(): string { return this.state.owner; }
  get name(): string { return this.state.name; }
  get description(): string | null { return this.state.description; }
  get visibility(): ModelVisibility { return this.state.visibility; }
  get githubUrl(): string | null { return this.state.githubUrl; }
  get paperUrl(): string | null { return this.state.paperUrl; }
  get licenseUrl(): string | null { return this.state.licenseUrl; }
  get runCount(): number { return this.state.runCount; }
  get coverImageUrl(): string | null { return this.state.coverImageUrl; }
  get defaultExample(): Prediction | null { return this.example; }
  get latestVersion(): Version | null { return this.latest; }

  get versions(): Versions {
    return this.context.models.versions(this.id);
  }

  applySnapshot(snapshot: ModelSnapshot): void {
    if (snapshot.owner !== this.state.owner || snapshot.name !== this.state.name) {
      throw new InvalidArgumentError(
        `Cannot apply snapshot of model ${snapshot.owner}/${snapshot.name} to model ${this.id}`,
      );
    }
    this.state = snapshot;
    this.example = this.wrapExample(snapshot);
    this.latest = this.wrapLatestVersion(snapshot);
  }

  async reload(): Promise<void> {
    const fresh = await this.context.models.get(this.id);
    this.applySnapshot(fresh.toJSON());
  }

  toJSON(): ModelSnapshot {
    return this.state;
  }

  private wrapExample(snapshot: ModelSnapshot): Prediction | null {
    return snapshot.defaultExample ? new Prediction(this.context, snapshot.defaultExample) : null;
  }

  private wrapLatestVersion(snapshot: ModelSnapshot): Version | null {
    return snapshot.latestVersion
      ? new Version(this.context, `${snapshot.owner}/${snapshot.name}`, snapshot.latestVersion)
      : null;
  }
}
