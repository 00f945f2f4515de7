import type { ClassifiedCommit, RepositoryRef } from "./types";

const kSections = [
  { category: "major", title: "Breaking Changes" },
  { category: "minor", title: "Features" },
  { category: "patch", title: "Fixes" },
] as const;

const kPullRequestSuffix = /\s+\(#(\d{1,8})\)$/;

export function repositoryUrl({ owner, repo, serverUrl }: RepositoryRef): string {
  return `${serverUrl.replace(/\/+$/, "")}/${owner}/${repo}`;
}

export function renderHashLink(hash: string, repository?: RepositoryRef): string {
  const short = `\`${hash.slice(0, 7)}\``;
  if (!repository) {
    return short;
  }
  return `[${short}](${repositoryUrl(repository)}/commit/${hash})`;
}

export function linkPullRequest(
  subject: string,
  repository?: RepositoryRef,
): string {
  if (!repository) {
    return subject;
  }
  return subject.replace(kPullRequestSuffix, (_, num: string) => {
    return ` ([#${num}](${repositoryUrl(repository)}/issues/${num}))`;
  });
}

export function renderEntry(
  c: ClassifiedCommit,
  repository?: RepositoryRef,
): string {
  const scope = c.scope ? `**${c.scope}:** ` : "";
  const subject = linkPullRequest(c.subject, repository);
  const lines = [
    `* ${scope}${subject} (${renderHashLink(c.commit.hash, repository)})`,
  ];
  if (c.category === "major") {
    lines.push(...c.breakingDescriptions.map((d) => `  * ${d}`));
  }
  return lines.join("\n");
}

/** Calendar date (UTC) of the newest commit, or null for an empty list. */
export function releaseDate(commits: ClassifiedCommit[]): string | null {
  let newest: number | null = null;
  for (const { commit } of commits) {
    const t = Date.parse(commit.timestamp);
    if (!Number.isNaN(t) && (newest === null || t > newest)) {
      newest = t;
    }
  }
  return newest === null ? null : new Date(newest).toISOString().slice(0, 10);
}

export function compareLink(
  previousTag: string,
  tag: string,
  repository: RepositoryRef,
): string {
  const url = `${repositoryUrl(repository)}/compare/${previousTag}...${tag}`;
  return `**[See all commits in this version](${url})**`;
}

/** The heading is the tag itself, e.g. `## pkg-a-v1.3.0 (2024-03-01)`. */
export function renderReleaseNotes({
  tag,
  commits,
  repository,
  previousTag,
  date = releaseDate(commits),
}: {
  tag: string;
  commits: ClassifiedCommit[];
  repository?: RepositoryRef;
  /** Tag the commits are counted from; adds a compare link with a repository. */
  previousTag?: string | null;
  date?: string | null;
}): string {
  const heading = date ? `## ${tag} (${date})` : `## ${tag}`;
  const sections: string[] = [];
  for (const { category, title } of kSections) {
    const entries = commits.filter((c) => c.category === category);
    if (entries.length === 0) {
      continue;
    }
    sections.push(
      [`### ${title}`, ...entries.map((c) => renderEntry(c, repository))].join(
        "\n",
      ),
    );
  }
  if (sections.length === 0) {
    sections.push("No notable changes.");
  }
  if (repository && previousTag) {
    sections.push(compareLink(previousTag, tag, repository));
  }
  return [heading, ...sections].join("\n\n");
}

const kChangelogTitle = "# Changelog";

export function prependChangelog(existing: string, notes: string): string {
  const text = existing.replace(/\r\n/g, "\n");
  const m = text.match(/^# [^\n]*\n?/);
  const title = m ? m[0].trimEnd() : kChangelogTitle;
  const rest = (m ? text.slice(m[0].length) : text).trim();
  const head = `${title}\n\n${notes.trimEnd()}\n`;
  return rest ? `${head}\n${rest}\n` : head;
}
