import type { ArtifactBuilder } from "../build";
import { PublishError } from "../errors";
import { pickReleases, type HistoryReader } from "../history";
import type { ReleasePublisher } from "../publisher";
import type { Commit, ReleasePlan, ReleaseTags } from "../types";

/** In-memory repository: a linear history plus tags pointing into it. */
export class FakeHistory implements HistoryReader {
  readonly tags: { name: string; hash: string }[] = [];

  constructor(readonly commits: Commit[] = []) {}

  commit(hash: string, message: string, timestamp = "2024-03-01T10:00:00Z") {
    this.commits.push({ hash, message, timestamp });
    return this;
  }

  tag(name: string, hash = this.headHash()) {
    this.tags.push({ name, hash });
    return this;
  }

  private headHash(): string {
    const last = this.commits[this.commits.length - 1];
    if (!last) {
      throw new Error("empty history");
    }
    return last.hash;
  }

  async head(): Promise<string> {
    return this.headHash();
  }

  async latestReleases(tagFormat: string): Promise<ReleaseTags> {
    return pickReleases(this.tags, tagFormat);
  }

  async commitsSince(since: string | null): Promise<Commit[]> {
    const idx = since ? this.commits.findIndex((c) => c.hash === since) : -1;
    return this.commits.slice(idx + 1);
  }
}

/** Tags the fake history on publish, the way a push would. */
export class FakePublisher implements ReleasePublisher {
  readonly published: { plan: ReleasePlan; artifacts: string[] }[] = [];
  /** Tags pushed by someone else and not yet fetched. */
  readonly remoteTags = new Set<string>();
  verified = 0;

  constructor(private readonly history: FakeHistory) {}

  async verify(plan: ReleasePlan): Promise<void> {
    this.verified += 1;
    if (
      this.remoteTags.has(plan.tag) ||
      this.history.tags.some((t) => t.name === plan.tag)
    ) {
      throw new PublishError(`tag ${plan.tag} already exists on the remote`);
    }
  }

  async publish(plan: ReleasePlan, artifacts: string[]): Promise<void> {
    // yield so that a concurrent run gets the chance to interleave
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.history.tag(plan.tag);
    this.published.push({ plan, artifacts });
  }
}

export class FakeBuilder implements ArtifactBuilder {
  builds = 0;

  constructor(private readonly artifacts: string[] = ["dist/pkg.tgz"]) {}

  async build(): Promise<string[]> {
    this.builds += 1;
    return this.artifacts;
  }
}
