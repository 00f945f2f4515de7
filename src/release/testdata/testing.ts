import type {
  ChangeCategory,
  ClassifiedCommit,
  Commit,
  ReleasePlan,
} from "../types";

export function makeCommit(overrides: Partial<Commit> = {}): Commit {
  return {
    hash: "0123456789abcdef0123456789abcdef01234567",
    message: "fix: handle empty input",
    timestamp: "2024-03-01T10:00:00Z",
    ...overrides,
  };
}

export function makeClassified(
  category: ChangeCategory,
  overrides: Partial<ClassifiedCommit> = {},
): ClassifiedCommit {
  return {
    commit: makeCommit(),
    category,
    type: category === "minor" ? "feature" : "fix",
    scope: null,
    subject: "handle empty input",
    breakingDescriptions: [],
    ...overrides,
  };
}

export function makePlan(overrides: Partial<ReleasePlan> = {}): ReleasePlan {
  return {
    current: { major: 1, minor: 2, patch: 3 },
    version: { major: 1, minor: 3, patch: 0 },
    category: "minor",
    tag: "v1.3.0",
    notes: "## v1.3.0 (2024-03-01)\n\n### Features\n* add export (`0123456`)",
    commits: [],
    ...overrides,
  };
}
