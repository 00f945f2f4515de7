import { ConfigurationError } from "./errors";
import type { ChangeCategory, ClassifiedCommit, Commit } from "./types";

export interface CommitClassifier {
  readonly name: string;
  classify(commit: Commit): ClassifiedCommit;
}

const kBreakingPattern = /^BREAKING[ -]CHANGE:\s?([\s\S]*)$/;

export function parseParagraphs(text: string): string[] {
  return text
    .replace(/\r\n/g, "\n")
    .split(/\n\s*\n/)
    .map((p) =>
      p
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .join(" "),
    )
    .filter((p) => p.length > 0);
}

function findBreakingDescriptions(paragraphs: string[]): string[] {
  const found: string[] = [];
  for (const p of paragraphs) {
    const m = p.match(kBreakingPattern);
    if (m) {
      found.push(m[1]);
    }
  }
  return found;
}

function unclassified(commit: Commit): ClassifiedCommit {
  const [subject = ""] = commit.message.split("\n");
  return {
    commit,
    category: "none",
    type: null,
    scope: null,
    subject: subject.trim(),
    breakingDescriptions: [],
  };
}

export type AngularOptions = {
  allowedTypes: readonly string[];
  minorTypes: readonly string[];
  patchTypes: readonly string[];
};

export const kAngularDefaults: AngularOptions = {
  allowedTypes: [
    "build",
    "chore",
    "ci",
    "docs",
    "feat",
    "fix",
    "perf",
    "style",
    "refactor",
    "test",
  ],
  minorTypes: ["feat"],
  patchTypes: ["fix", "perf"],
};

const kLongTypeNames: Record<string, string> = {
  feat: "feature",
  docs: "documentation",
  perf: "performance",
};

// type(scope)!: subject, then an optional body after a blank line
export class AngularClassifier implements CommitClassifier {
  readonly name = "angular";
  private readonly pattern: RegExp;

  constructor(private readonly options: AngularOptions = kAngularDefaults) {
    const types = options.allowedTypes.map(escapeRegExp).join("|");
    this.pattern = new RegExp(
      `^(${types})(?:\\(([^\\n)]+)\\))?(!)?:\\s+([^\\n]+)(?:\\n\\n([\\s\\S]+))?`,
    );
  }

  classify(commit: Commit): ClassifiedCommit {
    const m = commit.message.replace(/\r\n/g, "\n").match(this.pattern);
    if (!m) {
      return unclassified(commit);
    }
    const [, type, scope, bang, subject, body] = m;
    const breakingDescriptions = findBreakingDescriptions(
      body ? parseParagraphs(body) : [],
    );
    let category: ChangeCategory = "none";
    if (bang || breakingDescriptions.length > 0) {
      category = "major";
    } else if (this.options.minorTypes.includes(type)) {
      category = "minor";
    } else if (this.options.patchTypes.includes(type)) {
      category = "patch";
    }
    return {
      commit,
      category,
      type: kLongTypeNames[type] ?? type,
      scope: scope ?? null,
      subject: subject.trim(),
      breakingDescriptions,
    };
  }
}

export type TagOptions = {
  minorTag: string;
  patchTag: string;
};

/** Legacy grammar: an emoji tag anywhere in the message decides the bump. */
export class TagClassifier implements CommitClassifier {
  readonly name = "tag";

  constructor(
    private readonly options: TagOptions = {
      minorTag: ":sparkles:",
      patchTag: ":nut_and_bolt:",
    },
  ) {}

  classify(commit: Commit): ClassifiedCommit {
    const message = commit.message.replace(/\r\n/g, "\n");
    const [firstLine, ...rest] = message.split("\n");
    let category: ChangeCategory;
    let type: string;
    let subject = firstLine;
    if (message.includes(this.options.minorTag)) {
      category = "minor";
      type = "feature";
      subject = subject.split(this.options.minorTag).join("");
    } else if (message.includes(this.options.patchTag)) {
      category = "patch";
      type = "fix";
      subject = subject.split(this.options.patchTag).join("");
    } else {
      return unclassified(commit);
    }
    const breakingDescriptions = findBreakingDescriptions(
      parseParagraphs(rest.join("\n")),
    );
    if (breakingDescriptions.length > 0) {
      category = "major";
      type = "breaking";
    }
    return {
      commit,
      category,
      type,
      scope: null,
      subject: subject.trim(),
      breakingDescriptions,
    };
  }
}

const kClassifiers = new Map<string, () => CommitClassifier>([
  ["angular", () => new AngularClassifier()],
  ["tag", () => new TagClassifier()],
]);

export function getClassifier(name: string): CommitClassifier {
  const factory = kClassifiers.get(name);
  if (!factory) {
    throw new ConfigurationError(
      `unknown commit_parser: ${name}. Expected one of ${[...kClassifiers.keys()].join(", ")}.`,
    );
  }
  return factory();
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
