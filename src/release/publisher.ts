import * as core from "@actions/core";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PublishError } from "./errors";
import type { Git } from "./git";
import type { ReleaseClient } from "./github";
import { prependChangelog } from "./notes";
import type { RepositoryClient } from "./repository";
import type {
  Committer,
  Credentials,
  ReleasePlan,
  SigningKeys,
} from "./types";
import { formatVersion } from "./version";

export interface ReleasePublisher {
  /** Checks that can run before anything is pushed. */
  verify(plan: ReleasePlan): Promise<void>;
  publish(plan: ReleasePlan, artifacts: string[]): Promise<void>;
}

export type GitPublisherOptions = {
  branch: string;
  remoteUrl: string;
  committer: Committer;
  credentials: Credentials;
  signingKeys?: SigningKeys;
  commit: boolean;
  changelogFile: string | null;
  uploadToRelease: boolean;
};

const fail = (detail: string) => new PublishError(detail);

export function releaseCommitMessage(plan: ReleasePlan): string {
  return `chore(release): ${formatVersion(plan.version)}`;
}

export class GitPublisher implements ReleasePublisher {
  constructor(
    private readonly git: Git,
    private readonly releases: ReleaseClient,
    private readonly repository: RepositoryClient | null,
    private readonly options: GitPublisherOptions,
  ) {}

  async verify(plan: ReleasePlan): Promise<void> {
    this.repository?.verify(this.options.credentials);
    const local = await this.git.exec([
      "rev-parse",
      "--quiet",
      "--verify",
      `refs/tags/${plan.tag}`,
    ]);
    if (local.exitCode === 0) {
      throw new PublishError(`tag ${plan.tag} already exists locally`);
    }
    const remote = await this.git.run(
      ["ls-remote", "--tags", this.options.remoteUrl, `refs/tags/${plan.tag}`],
      fail,
    );
    if (remote.trim().length > 0) {
      throw new PublishError(`tag ${plan.tag} already exists on the remote`);
    }
  }

  async publish(plan: ReleasePlan, artifacts: string[]): Promise<void> {
    await withSigningConfig(
      this.options.committer,
      this.options.signingKeys,
      async (signing) => {
        const { name, email } = this.options.committer;
        const git = this.git.withConfig({
          "user.name": name,
          "user.email": email,
          ...signing,
        });
        await this.tagAndPush(git, plan);
      },
    );
    try {
      await this.upload(plan, artifacts);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new PublishError(message, plan.tag);
    }
  }

  private async tagAndPush(git: Git, plan: ReleasePlan): Promise<void> {
    const { branch, remoteUrl, commit, changelogFile } = this.options;
    const refs = [`refs/tags/${plan.tag}`];
    if (commit) {
      if (changelogFile) {
        await this.updateChangelog(changelogFile, plan.notes);
        await git.run(["add", "--", changelogFile], fail);
      }
      await git.run(
        ["commit", "--allow-empty", "-m", releaseCommitMessage(plan)],
        fail,
      );
      core.info(`Created release commit: ${releaseCommitMessage(plan)}`);
      refs.unshift(`HEAD:refs/heads/${branch}`);
    }
    await git.run(["tag", "-a", plan.tag, "-m", plan.tag], fail);
    core.info(`Pushing ${plan.tag} to ${branch}...`);
    await git.run(["push", "--atomic", remoteUrl, ...refs], fail);
    core.info(`Pushed ${plan.tag}`);
  }

  private async updateChangelog(file: string, notes: string): Promise<void> {
    const path = join(this.git.cwd, file);
    const existing = await readFile(path, "utf-8").catch((e: unknown) => {
      if (isNotFound(e)) {
        return "";
      }
      throw new PublishError(`cannot read ${file}: ${String(e)}`);
    });
    await writeFile(path, prependChangelog(existing, notes));
  }

  private async upload(plan: ReleasePlan, artifacts: string[]): Promise<void> {
    const release = await this.releases.createRelease({
      tag: plan.tag,
      body: plan.notes,
      prerelease: plan.version.prerelease !== undefined,
    });
    if (this.options.uploadToRelease) {
      for (const file of artifacts) {
        await this.releases.uploadAsset(release, file);
      }
    }
    if (this.repository) {
      await this.repository.upload(artifacts, this.options.credentials);
    }
  }
}

function isNotFound(e: unknown): boolean {
  return (
    typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT"
  );
}

/**
 * Runs `fn` with git config entries that sign commits and tags with the given
 * SSH key. The key only lives on disk for the duration of `fn`.
 */
export async function withSigningConfig<T>(
  committer: Committer,
  keys: SigningKeys | undefined,
  fn: (config: Record<string, string>) => Promise<T>,
): Promise<T> {
  if (!keys) {
    return fn({});
  }
  const dir = await mkdtemp(join(tmpdir(), "release-signing-"));
  try {
    const keyFile = join(dir, "signing_key");
    const signersFile = join(dir, "allowed_signers");
    await writeFile(keyFile, ensureTrailingNewline(keys.privateKey), {
      mode: 0o600,
    });
    await writeFile(
      signersFile,
      `${committer.email} ${keys.publicKey.trim()}\n`,
    );
    return await fn({
      "gpg.format": "ssh",
      "user.signingkey": keyFile,
      "gpg.ssh.allowedSignersFile": signersFile,
      "commit.gpgsign": "true",
      "tag.gpgsign": "true",
    });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function ensureTrailingNewline(s: string): string {
  return s.endsWith("\n") ? s : `${s}\n`;
}
