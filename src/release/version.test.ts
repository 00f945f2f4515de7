import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors";
import type { ChangeCategory } from "./types";
import {
  assertTagFormat,
  bump,
  compareVersions,
  finalizeVersion,
  formatVersion,
  maxCategory,
  nextVersion,
  parseVersion,
  tagFor,
  versionDiff,
  versionFromTag,
} from "./version";

const v = (major: number, minor: number, patch: number) => ({
  major,
  minor,
  patch,
});

const pre = (
  major: number,
  minor: number,
  patch: number,
  token: string,
  revision: number,
) => ({ major, minor, patch, prerelease: { token, revision } });

describe("parseVersion", () => {
  it("should parse plain and v-prefixed versions", () => {
    expect(parseVersion("1.2.3")).toEqual(v(1, 2, 3));
    expect(parseVersion("v10.0.7")).toEqual(v(10, 0, 7));
  });

  it("should parse token.revision pre-releases", () => {
    expect(parseVersion("v1.3.0-rc.2")).toEqual(pre(1, 3, 0, "rc", 2));
    expect(parseVersion("2.0.0-beta-x.10")).toEqual(pre(2, 0, 0, "beta-x", 10));
  });

  it("should reject other pre-release shapes, build metadata and garbage", () => {
    expect(parseVersion("1.2.3-rc")).toBeNull();
    expect(parseVersion("1.2.3-1")).toBeNull();
    expect(parseVersion("1.2.3-rc.1.2")).toBeNull();
    expect(parseVersion("1.2.3+build.5")).toBeNull();
    expect(parseVersion("1.2")).toBeNull();
    expect(parseVersion("latest")).toBeNull();
  });
});

describe("compareVersions", () => {
  it("should order by component, not lexically", () => {
    expect(compareVersions(v(1, 10, 0), v(1, 9, 9))).toBe(1);
    expect(compareVersions(v(1, 2, 3), v(1, 2, 3))).toBe(0);
    expect(compareVersions(v(0, 9, 0), v(1, 0, 0))).toBe(-1);
  });

  it("should order pre-releases below their release", () => {
    expect(compareVersions(pre(1, 3, 0, "rc", 2), v(1, 3, 0))).toBe(-1);
    expect(compareVersions(pre(1, 3, 0, "rc", 2), pre(1, 3, 0, "rc", 10))).toBe(
      -1,
    );
    expect(compareVersions(pre(1, 3, 0, "rc", 1), v(1, 2, 9))).toBe(1);
  });
});

describe("tags", () => {
  it("should render the tag format", () => {
    expect(tagFor(v(1, 3, 0), "v{version}")).toBe("v1.3.0");
    expect(tagFor(v(2, 0, 1), "pkg-a@{version}")).toBe("pkg-a@2.0.1");
    expect(tagFor(pre(2, 0, 0, "rc", 3), "v{version}")).toBe("v2.0.0-rc.3");
  });

  it("should read versions back from tags", () => {
    expect(versionFromTag("v1.3.0", "v{version}")).toEqual(v(1, 3, 0));
    expect(versionFromTag("pkg-a@2.0.1", "pkg-a@{version}")).toEqual(v(2, 0, 1));
    expect(versionFromTag("1.0.0", "{version}")).toEqual(v(1, 0, 0));
    expect(versionFromTag("v1.3.0-rc.1", "v{version}")).toEqual(
      pre(1, 3, 0, "rc", 1),
    );
  });

  it("should ignore tags that do not match the format", () => {
    expect(versionFromTag("pkg-b@2.0.1", "pkg-a@{version}")).toBeNull();
    expect(versionFromTag("vv1.3.0", "v{version}")).toBeNull();
    expect(versionFromTag("v", "v{version}")).toBeNull();
    expect(versionFromTag("nightly", "v{version}")).toBeNull();
  });

  it("should require {version} in the tag format", () => {
    expect(() => assertTagFormat("release")).toThrow(ConfigurationError);
    expect(() => assertTagFormat("v{version}")).not.toThrow();
  });
});

describe("maxCategory", () => {
  it("should pick the most severe category", () => {
    expect(maxCategory(["patch", "major", "minor"])).toBe("major");
    expect(maxCategory(["none", "patch"])).toBe("patch");
    expect(maxCategory([])).toBe("none");
  });
});

describe("bump", () => {
  it("should reset lower components", () => {
    expect(bump(v(1, 2, 3), "major")).toEqual(v(2, 0, 0));
    expect(bump(v(1, 2, 3), "minor")).toEqual(v(1, 3, 0));
    expect(bump(v(1, 2, 3), "patch")).toEqual(v(1, 2, 4));
    expect(bump(v(1, 2, 3), "none")).toEqual(v(1, 2, 3));
  });

  it("should drop the pre-release part", () => {
    expect(bump(pre(1, 3, 0, "rc", 2), "patch")).toEqual(v(1, 3, 1));
    expect(finalizeVersion(pre(1, 3, 0, "rc", 2))).toEqual(v(1, 3, 0));
  });
});

describe("versionDiff", () => {
  it("should report the most significant difference", () => {
    expect(versionDiff(v(2, 0, 0), v(1, 9, 9))).toBe("major");
    expect(versionDiff(pre(1, 3, 0, "rc", 1), v(1, 2, 0))).toBe("minor");
    expect(versionDiff(pre(1, 2, 1, "rc", 1), v(1, 2, 0))).toBe("patch");
    expect(versionDiff(pre(1, 2, 0, "rc", 1), v(1, 2, 0))).toBe("prerelease");
    expect(versionDiff(v(1, 2, 0), v(1, 2, 0))).toBe("none");
  });
});

describe("nextVersion", () => {
  it("should bump minor for [minor, patch]", () => {
    expect(nextVersion(v(1, 2, 3), ["minor", "patch"])).toEqual({
      release: true,
      version: v(1, 3, 0),
      category: "minor",
    });
  });

  it("should bump patch once for repeated patches", () => {
    expect(nextVersion(v(1, 2, 3), ["patch", "patch"])).toEqual({
      release: true,
      version: v(1, 2, 4),
      category: "patch",
    });
  });

  it("should equal the result for major alone", () => {
    expect(nextVersion(v(1, 2, 3), ["patch", "major", "minor"])).toEqual(
      nextVersion(v(1, 2, 3), ["major"]),
    );
  });

  it("should not depend on commit order", () => {
    const categories: ChangeCategory[] = ["none", "patch", "minor", "patch"];
    const expected = nextVersion(v(0, 4, 1), categories);
    for (let i = 0; i < categories.length; i++) {
      const rotated = [...categories.slice(i), ...categories.slice(0, i)];
      expect(nextVersion(v(0, 4, 1), rotated)).toEqual(expected);
      expect(nextVersion(v(0, 4, 1), [...rotated].reverse())).toEqual(expected);
    }
  });

  it("should signal no release distinctly", () => {
    expect(nextVersion(v(1, 2, 3), ["none", "none"])).toEqual({
      release: false,
    });
    expect(nextVersion(v(1, 2, 3), [])).toEqual({ release: false });
  });

  it("should bump minor for breaking changes on 0.x without majorOnZero", () => {
    expect(
      nextVersion(v(0, 3, 1), ["major"], { majorOnZero: false }),
    ).toEqual({ release: true, version: v(0, 4, 0), category: "minor" });
    expect(
      nextVersion(v(1, 3, 1), ["major"], { majorOnZero: false }),
    ).toEqual({ release: true, version: v(2, 0, 0), category: "major" });
  });

  it("should apply a forced category", () => {
    expect(nextVersion(v(1, 2, 3), [], { forceCategory: "patch" })).toEqual({
      release: true,
      version: v(1, 2, 4),
      category: "patch",
    });
    expect(
      nextVersion(v(0, 2, 3), ["patch"], {
        forceCategory: "major",
        majorOnZero: false,
      }),
    ).toEqual({ release: true, version: v(1, 0, 0), category: "major" });
  });

  it("should format versions", () => {
    expect(formatVersion(v(1, 3, 0))).toBe("1.3.0");
    expect(formatVersion(pre(1, 3, 0, "rc", 2))).toBe("1.3.0-rc.2");
  });
});

describe("nextVersion with pre-releases", () => {
  const rc = { prereleaseToken: "rc" };

  it("should start a pre-release from a full release", () => {
    expect(nextVersion(v(1, 2, 0), ["minor"], rc)).toEqual({
      release: true,
      version: pre(1, 3, 0, "rc", 1),
      category: "minor",
    });
  });

  it("should count revisions while the bump stays within the pending one", () => {
    const current = pre(1, 3, 0, "rc", 1);
    expect(
      nextVersion(current, ["patch"], { ...rc, latestFull: v(1, 2, 0) }),
    ).toEqual({
      release: true,
      version: pre(1, 3, 0, "rc", 2),
      category: "patch",
    });
    expect(
      nextVersion(current, ["minor"], { ...rc, latestFull: v(1, 2, 0) }),
    ).toMatchObject({ version: pre(1, 3, 0, "rc", 2) });
  });

  it("should restart from the full release when the bump grows", () => {
    expect(
      nextVersion(pre(1, 2, 1, "rc", 3), ["minor"], {
        ...rc,
        latestFull: v(1, 2, 0),
      }),
    ).toMatchObject({ version: pre(1, 3, 0, "rc", 1) });
    expect(
      nextVersion(pre(1, 3, 0, "rc", 3), ["major"], {
        ...rc,
        latestFull: v(1, 2, 0),
      }),
    ).toMatchObject({ version: pre(2, 0, 0, "rc", 1) });
  });

  it("should restart the revision when the token changes", () => {
    expect(
      nextVersion(pre(1, 3, 0, "rc", 2), ["patch"], {
        prereleaseToken: "beta",
        latestFull: v(1, 2, 0),
      }),
    ).toMatchObject({ version: pre(1, 3, 0, "beta", 1) });
  });

  it("should finalize a pending pre-release", () => {
    expect(
      nextVersion(pre(1, 3, 0, "rc", 2), ["minor", "patch"], {
        latestFull: v(1, 2, 0),
      }),
    ).toEqual({ release: true, version: v(1, 3, 0), category: "minor" });
  });

  it("should bump past a pending pre-release the bump outgrows", () => {
    expect(
      nextVersion(pre(1, 3, 0, "rc", 2), ["major"], {
        latestFull: v(1, 2, 0),
      }),
    ).toEqual({ release: true, version: v(2, 0, 0), category: "major" });
  });

  it("should measure against 0.0.0 without a full release", () => {
    expect(nextVersion(pre(0, 1, 0, "rc", 1), ["patch"], rc)).toMatchObject({
      version: pre(0, 1, 0, "rc", 2),
    });
    expect(nextVersion(pre(0, 1, 0, "rc", 1), ["minor"])).toMatchObject({
      version: v(0, 1, 0),
    });
  });

  it("should not release a pre-release without release-worthy commits", () => {
    expect(nextVersion(pre(1, 3, 0, "rc", 2), ["none"], rc)).toEqual({
      release: false,
    });
  });
});
