export const kCategoryOrder = ["major", "minor", "patch", "none"] as const;
export type ChangeCategory = (typeof kCategoryOrder)[number];

export type Commit = {
  hash: string;
  message: string;
  timestamp: string;
};

export type ClassifiedCommit = {
  commit: Commit;
  category: ChangeCategory;
  type: string | null;
  scope: string | null;
  subject: string;
  breakingDescriptions: string[];
};

/** `rc.2` in `1.3.0-rc.2`. */
export type Prerelease = {
  token: string;
  revision: number;
};

export type Version = {
  major: number;
  minor: number;
  patch: number;
  prerelease?: Prerelease;
};

export type LatestRelease = {
  tag: string;
  version: Version;
  hash: string;
};

export type ReleaseTags = {
  /** Highest version tag reachable from HEAD, pre-releases included. */
  latest: LatestRelease | null;
  /** Highest full release tag reachable from HEAD. */
  latestFull: LatestRelease | null;
};

export type RepositoryRef = {
  owner: string;
  repo: string;
  serverUrl: string;
};

export type Credentials = {
  githubToken: string;
  repositoryUsername?: string;
  repositoryPassword?: string;
};

export type SigningKeys = {
  publicKey: string;
  privateKey: string;
};

export type Committer = {
  name: string;
  email: string;
};

export type ReleasePlan = {
  current: Version;
  version: Version;
  category: ChangeCategory;
  tag: string;
  notes: string;
  commits: ClassifiedCommit[];
};

export type ReleaseState =
  | "idle"
  | "computing"
  | "no-release"
  | "has-release"
  | "building"
  | "publishing"
  | "done"
  | "failed";

export type ReleaseOutcome =
  | { state: "no-release"; current: Version }
  | { state: "done"; plan: ReleasePlan; noop: boolean; artifacts: string[] };

export function compareCategories(a: ChangeCategory, b: ChangeCategory): number {
  return kCategoryOrder.indexOf(a) - kCategoryOrder.indexOf(b);
}
