import * as core from "@actions/core";
import { HistoryAccessError } from "./errors";
import type { Git } from "./git";
import type { Commit, LatestRelease, ReleaseTags } from "./types";
import { compareVersions, versionFromTag } from "./version";

export interface HistoryReader {
  head(): Promise<string>;
  latestReleases(tagFormat: string): Promise<ReleaseTags>;
  /** Commits after `since` up to HEAD, oldest first. All of history when `since` is null. */
  commitsSince(since: string | null): Promise<Commit[]>;
}

const kFieldSep = "\x1f";
const kRecordSep = "\x1e";

const fail = (detail: string) => new HistoryAccessError(detail);

export function parseTagList(out: string): { name: string; hash: string }[] {
  return out
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const [name, object, peeled] = line.split(kFieldSep);
      // annotated tags point at a tag object; the peeled hash is the commit
      return { name, hash: peeled || object };
    });
}

export function parseCommitLog(out: string): Commit[] {
  return out
    .split(kRecordSep)
    .map((record) => record.replace(/^\n+/, ""))
    .filter((record) => record.length > 0)
    .map((record) => {
      const [hash, timestamp, ...message] = record.split(kFieldSep);
      return {
        hash,
        timestamp,
        message: message.join(kFieldSep).trim(),
      };
    });
}

function isNewer(candidate: LatestRelease, than: LatestRelease | null): boolean {
  return !than || compareVersions(candidate.version, than.version) > 0;
}

/** Picks the highest release and the highest full release among `tags`. */
export function pickReleases(
  tags: { name: string; hash: string }[],
  tagFormat: string,
): ReleaseTags {
  let latest: LatestRelease | null = null;
  let latestFull: LatestRelease | null = null;
  for (const { name, hash } of tags) {
    const version = versionFromTag(name, tagFormat);
    if (!version) {
      core.debug(`ignoring tag ${name}: does not match ${tagFormat}`);
      continue;
    }
    const release = { tag: name, version, hash };
    if (isNewer(release, latest)) {
      latest = release;
    }
    if (!version.prerelease && isNewer(release, latestFull)) {
      latestFull = release;
    }
  }
  return { latest, latestFull };
}

export class GitHistoryReader implements HistoryReader {
  /**
   * @param scoped - limit commits to the working directory, for sub-projects
   * of a monorepo
   */
  constructor(
    private readonly git: Git,
    private readonly scoped = false,
  ) {}

  async head(): Promise<string> {
    const out = await this.git.run(["rev-parse", "HEAD"], fail);
    return out.trim();
  }

  async latestReleases(tagFormat: string): Promise<ReleaseTags> {
    const out = await this.git.run(
      [
        "tag",
        "--merged",
        "HEAD",
        `--format=%(refname:strip=2)${kFieldSep}%(objectname)${kFieldSep}%(*objectname)`,
      ],
      fail,
    );
    return pickReleases(parseTagList(out), tagFormat);
  }

  async commitsSince(since: string | null): Promise<Commit[]> {
    const args = [
      "log",
      "--reverse",
      `--format=%H${kFieldSep}%cI${kFieldSep}%B${kRecordSep}`,
    ];
    args.push(since ? `${since}..HEAD` : "HEAD");
    if (this.scoped) {
      args.push("--", ".");
    }
    return parseCommitLog(await this.git.run(args, fail));
  }
}
