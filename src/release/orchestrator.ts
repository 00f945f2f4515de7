import * as core from "@actions/core";
import type { ArtifactBuilder } from "./build";
import type { CommitClassifier } from "./classifier";
import { ReleaseTimeoutError } from "./errors";
import type { HistoryReader } from "./history";
import type { ProjectLock } from "./lock";
import { renderReleaseNotes } from "./notes";
import type { ReleasePublisher } from "./publisher";
import type {
  ChangeCategory,
  ClassifiedCommit,
  ReleaseOutcome,
  ReleasePlan,
  ReleaseState,
  RepositoryRef,
  Version,
} from "./types";
import {
  formatVersion,
  kInitialVersion,
  nextVersion,
  tagFor,
} from "./version";

export type OrchestratorOptions = {
  projectKey: string;
  tagFormat: string;
  majorOnZero: boolean;
  forceCategory?: Exclude<ChangeCategory, "none">;
  /** Release a pre-release with this token instead of a full release. */
  prereleaseToken?: string;
  noop: boolean;
  build: boolean;
  verbosity: number;
  timeoutMinutes: number;
  repository?: RepositoryRef;
};

export type OrchestratorDeps = {
  history: HistoryReader;
  classifier: CommitClassifier;
  builder: ArtifactBuilder | null;
  publisher: ReleasePublisher;
  lock: ProjectLock;
};

type Computed = { current: Version; plan: ReleasePlan | null };
type Prepared = { computed: Computed; artifacts: string[] };

const kTerminalStates: ReadonlySet<ReleaseState> = new Set(["done", "failed"]);

export class ReleaseOrchestrator {
  private _state: ReleaseState = "idle";
  private _transitions: ReleaseState[] = ["idle"];

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {}

  get state(): ReleaseState {
    return this._state;
  }

  get transitions(): readonly ReleaseState[] {
    return this._transitions;
  }

  /** The version operation: computes what would be released, touches nothing. */
  async plan(): Promise<ReleasePlan | null> {
    this.reset();
    try {
      const { plan } = await this.withTimeout((signal) => this.compute(signal));
      return plan;
    } catch (e) {
      this.transition("failed");
      throw e;
    }
  }

  /** The publish operation: compute, build and publish under the project lock. */
  async release(): Promise<ReleaseOutcome> {
    const { lock } = this.deps;
    const { projectKey } = this.options;
    if (lock.isLocked(projectKey)) {
      core.info(`Waiting for another release of ${projectKey} to finish...`);
    }
    return lock.run(projectKey, async () => {
      this.reset();
      try {
        return await this.releaseLocked();
      } catch (e) {
        this.transition("failed");
        throw e;
      }
    });
  }

  private async releaseLocked(): Promise<ReleaseOutcome> {
    const { builder, publisher } = this.deps;
    const { noop, build } = this.options;
    const prepared = await this.withTimeout(
      async (signal): Promise<Prepared> => {
        const computed = await this.compute(signal);
        const { plan } = computed;
        if (!plan || noop) {
          return { computed, artifacts: [] };
        }
        this.transition("building");
        const artifacts = build && builder ? await builder.build(plan) : [];
        signal.throwIfAborted();
        await publisher.verify(plan);
        signal.throwIfAborted();
        return { computed, artifacts };
      },
    );
    const {
      computed: { current, plan },
      artifacts,
    } = prepared;
    if (!plan) {
      return { state: "no-release", current };
    }
    if (noop) {
      core.info(
        `[noop] would release ${plan.tag} (${formatVersion(current)} -> ${formatVersion(plan.version)})`,
      );
      core.info(`[noop] release notes:\n${plan.notes}`);
      this.transition("done");
      return { state: "done", plan, noop, artifacts };
    }
    // past this point the tag may reach the remote; run to completion
    this.transition("publishing");
    await publisher.publish(plan, artifacts);
    this.transition("done");
    core.info(`Released ${plan.tag}`);
    return { state: "done", plan, noop, artifacts };
  }

  /**
   * A pre-release counts commits since the latest tag of any kind. A full
   * release counts them since the latest full release, pre-releases
   * included.
   */
  private async compute(signal: AbortSignal): Promise<Computed> {
    const { history, classifier } = this.deps;
    const { tagFormat, majorOnZero, forceCategory, prereleaseToken, repository } =
      this.options;
    // a timed-out run must not get past any of the awaits below
    this.transition("computing");
    const head = await history.head();
    signal.throwIfAborted();
    const { latest, latestFull } = await history.latestReleases(tagFormat);
    signal.throwIfAborted();
    const current = latest?.version ?? kInitialVersion;
    const since = prereleaseToken ? latest : latestFull;
    if (latest) {
      core.info(`Latest release: ${latest.tag} (${latest.hash.slice(0, 7)})`);
    } else {
      core.info(`No previous release found, starting from ${formatVersion(current)}`);
    }
    if (latestFull && latestFull !== latest) {
      core.info(`Latest full release: ${latestFull.tag}`);
    }
    if (since && since.hash === head) {
      core.info("HEAD is already released. No release will be made.");
      this.transition("no-release");
      return { current, plan: null };
    }
    const commits = await history.commitsSince(since?.hash ?? null);
    signal.throwIfAborted();
    const classified = commits.map((c) => classifier.classify(c));
    this.logClassified(classified);
    const next = nextVersion(
      current,
      classified.map((c) => c.category),
      {
        majorOnZero,
        forceCategory,
        prereleaseToken,
        latestFull: latestFull?.version ?? kInitialVersion,
      },
    );
    if (!next.release) {
      core.info(
        `${commits.length} commit(s) since the last release, none release-worthy. No release will be made.`,
      );
      this.transition("no-release");
      return { current, plan: null };
    }
    const tag = tagFor(next.version, tagFormat);
    const notes = renderReleaseNotes({
      tag,
      commits: classified,
      repository,
      previousTag: since?.tag,
    });
    core.info(
      `Next version: ${formatVersion(next.version)} (${next.category} release)`,
    );
    this.transition("has-release");
    return {
      current,
      plan: {
        current,
        version: next.version,
        category: next.category,
        tag,
        notes,
        commits: classified,
      },
    };
  }

  private logClassified(classified: ClassifiedCommit[]): void {
    const log = this.options.verbosity >= 2 ? core.info : core.debug;
    for (const c of classified) {
      log(`${c.commit.hash.slice(0, 7)} ${c.category}: ${c.subject}`);
    }
  }

  private reset(): void {
    this._state = "idle";
    this._transitions = ["idle"];
  }

  private transition(to: ReleaseState): void {
    if (kTerminalStates.has(this._state)) {
      core.debug(`release state: ignoring ${to} after ${this._state}`);
      return;
    }
    const log = this.options.verbosity >= 1 ? core.info : core.debug;
    log(`release state: ${this._state} -> ${to}`);
    this._state = to;
    this._transitions.push(to);
  }

  /** Races `fn` against the run timeout and aborts its signal on expiry. */
  private async withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const { timeoutMinutes } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const e = new ReleaseTimeoutError(timeoutMinutes);
        controller.abort(e);
        reject(e);
      }, timeoutMinutes * 60 * 1000);
    });
    try {
      return await Promise.race([fn(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
