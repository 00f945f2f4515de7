import * as semver from "semver";
import { ConfigurationError } from "./errors";
import {
  compareCategories,
  type ChangeCategory,
  type Prerelease,
  type Version,
} from "./types";

export const kInitialVersion: Version = { major: 0, minor: 0, patch: 0 };

const kPrereleaseToken = /^[A-Za-z][0-9A-Za-z-]*$/;

export function isPrereleaseToken(token: string): boolean {
  return kPrereleaseToken.test(token);
}

function readPrerelease(
  parts: ReadonlyArray<string | number>,
): Prerelease | null {
  const [token, revision] = parts;
  if (
    parts.length !== 2 ||
    typeof token !== "string" ||
    typeof revision !== "number" ||
    !isPrereleaseToken(token)
  ) {
    return null;
  }
  return { token, revision };
}

/**
 * Parses `1.2.3`, `v1.2.3` and pre-releases of the form `1.3.0-rc.2`.
 * Build metadata and other pre-release shapes are rejected.
 */
export function parseVersion(s: string): Version | null {
  const parsed = semver.parse(s.trim().replace(/^v/, ""));
  if (!parsed || parsed.build.length > 0) {
    return null;
  }
  const version: Version = {
    major: parsed.major,
    minor: parsed.minor,
    patch: parsed.patch,
  };
  if (parsed.prerelease.length === 0) {
    return version;
  }
  const prerelease = readPrerelease(parsed.prerelease);
  return prerelease ? { ...version, prerelease } : null;
}

export function formatVersion(v: Version): string {
  const numbers = `${v.major}.${v.minor}.${v.patch}`;
  return v.prerelease
    ? `${numbers}-${v.prerelease.token}.${v.prerelease.revision}`
    : numbers;
}

export function compareVersions(a: Version, b: Version): number {
  return semver.compare(formatVersion(a), formatVersion(b));
}

export function finalizeVersion({ major, minor, patch }: Version): Version {
  return { major, minor, patch };
}

export function assertTagFormat(tagFormat: string): void {
  if (!tagFormat.includes("{version}")) {
    throw new ConfigurationError(
      `tag_format must contain {version}: ${tagFormat}`,
    );
  }
}

export function tagFor(v: Version, tagFormat: string): string {
  return tagFormat.replace("{version}", formatVersion(v));
}

export function versionFromTag(tag: string, tagFormat: string): Version | null {
  const [prefix, suffix] = splitTagFormat(tagFormat);
  if (
    !tag.startsWith(prefix) ||
    !tag.endsWith(suffix) ||
    tag.length <= prefix.length + suffix.length
  ) {
    return null;
  }
  const raw = tag.slice(prefix.length, tag.length - suffix.length);
  // the prefix owns any "v"; "vv1.0.0" under "v{version}" is not a release tag
  if (raw.startsWith("v") && prefix.length > 0) {
    return null;
  }
  return parseVersion(raw);
}

function splitTagFormat(tagFormat: string): [string, string] {
  const idx = tagFormat.indexOf("{version}");
  return [
    tagFormat.slice(0, idx),
    tagFormat.slice(idx + "{version}".length),
  ];
}

export function maxCategory(
  categories: Iterable<ChangeCategory>,
): ChangeCategory {
  let max: ChangeCategory = "none";
  for (const c of categories) {
    if (compareCategories(c, max) < 0) {
      max = c;
    }
  }
  return max;
}

/** Bumps the numeric part; the result is always a full release, except for `none`. */
export function bump(v: Version, category: ChangeCategory): Version {
  switch (category) {
    case "major":
      return { major: v.major + 1, minor: 0, patch: 0 };
    case "minor":
      return { major: v.major, minor: v.minor + 1, patch: 0 };
    case "patch":
      return { major: v.major, minor: v.minor, patch: v.patch + 1 };
    case "none":
      return { ...v };
  }
}

export type VersionDiff = ChangeCategory | "prerelease";

const kDiffRank: Record<VersionDiff, number> = {
  none: 0,
  prerelease: 1,
  patch: 2,
  minor: 3,
  major: 4,
};

/** The most significant component in which `a` and `b` differ. */
export function versionDiff(a: Version, b: Version): VersionDiff {
  if (a.major !== b.major) {
    return "major";
  }
  if (a.minor !== b.minor) {
    return "minor";
  }
  if (a.patch !== b.patch) {
    return "patch";
  }
  return formatVersion(a) === formatVersion(b) ? "none" : "prerelease";
}

export type NextVersionOptions = {
  majorOnZero?: boolean;
  forceCategory?: Exclude<ChangeCategory, "none">;
  /** Produce a pre-release with this token, e.g. `rc`. */
  prereleaseToken?: string;
  /**
   * Latest full release in history. Defaults to `current` when that is a
   * full release, and to 0.0.0 otherwise.
   */
  latestFull?: Version;
};

export type NextVersion =
  | { release: false }
  | { release: true; version: Version; category: ChangeCategory };

export function nextVersion(
  current: Version,
  categories: Iterable<ChangeCategory>,
  {
    majorOnZero = true,
    forceCategory,
    prereleaseToken,
    latestFull = current.prerelease ? kInitialVersion : current,
  }: NextVersionOptions = {},
): NextVersion {
  let category = forceCategory ?? maxCategory(categories);
  if (category === "none") {
    return { release: false };
  }
  if (
    !forceCategory &&
    category === "major" &&
    !majorOnZero &&
    current.major === 0
  ) {
    category = "minor";
  }
  // a pending pre-release may already carry this bump: 1.2.0 -> 1.3.0-rc.1
  // covers any minor or patch change until 1.3.0 is released
  const outgrowsPending =
    kDiffRank[category] > kDiffRank[versionDiff(current, latestFull)];
  let version: Version;
  if (prereleaseToken) {
    if (outgrowsPending) {
      version = {
        ...bump(latestFull, category),
        prerelease: { token: prereleaseToken, revision: 1 },
      };
    } else {
      const pending = current.prerelease;
      const revision =
        pending && pending.token === prereleaseToken ? pending.revision + 1 : 1;
      version = {
        ...finalizeVersion(current),
        prerelease: { token: prereleaseToken, revision },
      };
    }
  } else if (current.prerelease) {
    version = outgrowsPending
      ? bump(current, category)
      : finalizeVersion(current);
  } else {
    version = bump(current, category);
  }
  return { release: true, version, category };
}
