import * as core from "@actions/core";
import { getOctokit } from "@actions/github";
import * as io from "@actions/io";
import { assertInput, boolify, parseRef, parseRepository } from "../util";
import { CommandArtifactBuilder } from "./build";
import { getClassifier } from "./classifier";
import { ConfigurationError } from "./errors";
import { Git } from "./git";
import { GithubReleaseClient } from "./github";
import { GitHistoryReader } from "./history";
import { kProjectLock, projectKey, type ProjectLock } from "./lock";
import {
  parseGlobalOptions,
  parsePublishOptions,
  parseVersionOptions,
  type GlobalOptions,
  type PublishOptions,
  type VersionOptions,
} from "./options";
import { ReleaseOrchestrator } from "./orchestrator";
import { GitPublisher } from "./publisher";
import { CommandRepositoryClient } from "./repository";
import type {
  Committer,
  Credentials,
  ReleaseOutcome,
  ReleasePlan,
  RepositoryRef,
  SigningKeys,
} from "./types";
import { assertTagFormat, formatVersion } from "./version";

export type ReleaseConfig = {
  directory: string;
  repository: RepositoryRef;
  branch: string;
  credentials: Credentials;
  committer: Committer;
  signingKeys?: SigningKeys;
  commitParser: string;
  tagFormat: string;
  majorOnZero: boolean;
  buildCommand: string;
  distDirectory: string;
  uploadCommand: string;
  changelogFile: string;
  timeoutMinutes: number;
  global: GlobalOptions;
  version: VersionOptions;
  publish: PublishOptions;
  /** Environment handed to the build and upload commands. */
  env: Record<string, string>;
};

function inputOr(name: string, fallback: string): string {
  return core.getInput(name) || fallback;
}

function readSigningKeys(): SigningKeys | undefined {
  const publicKey = core.getInput("ssh_public_signing_key");
  const privateKey = core.getInput("ssh_private_signing_key");
  if (!publicKey && !privateKey) {
    return undefined;
  }
  if (!publicKey || !privateKey) {
    throw new ConfigurationError(
      "ssh_public_signing_key and ssh_private_signing_key must be given together",
    );
  }
  return { publicKey, privateKey };
}

// setTimeout takes a signed 32-bit delay in ms
export const kMaxTimeoutMinutes = Math.floor((2 ** 31 - 1) / (60 * 1000));

function readTimeout(): number {
  const raw = inputOr("timeout_minutes", "30");
  const minutes = Number(raw);
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new ConfigurationError(`timeout_minutes must be a positive number: ${raw}`);
  }
  if (minutes > kMaxTimeoutMinutes) {
    throw new ConfigurationError(
      `timeout_minutes must be at most ${kMaxTimeoutMinutes}: ${raw}`,
    );
  }
  return minutes;
}

export function inheritEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined) {
      out[k] = v;
    }
  }
  return out;
}

/** Reads every input and the workflow environment once. */
export function readConfig(env: NodeJS.ProcessEnv = process.env): ReleaseConfig {
  const credentials: Credentials = {
    githubToken: assertInput("github_token"),
    repositoryUsername: core.getInput("repository_username") || undefined,
    repositoryPassword: core.getInput("repository_password") || undefined,
  };
  maskCredentials(credentials);
  const signingKeys = readSigningKeys();
  if (signingKeys) {
    maskMultiline(signingKeys.privateKey);
  }
  const { owner, repo } = parseRepository(env.GITHUB_REPOSITORY);
  const ref = env.GITHUB_REF_NAME || (env.GITHUB_REF && parseRef(env.GITHUB_REF));
  if (!ref) {
    throw new ConfigurationError("GITHUB_REF_NAME is not set");
  }
  const tagFormat = inputOr("tag_format", "v{version}");
  assertTagFormat(tagFormat);
  return {
    directory: inputOr("directory", "."),
    repository: {
      owner,
      repo,
      serverUrl: env.GITHUB_SERVER_URL || "https://github.com",
    },
    branch: ref,
    credentials,
    committer: {
      name: inputOr("git_committer_name", "github-actions"),
      email: inputOr("git_committer_email", "github-actions@github.com"),
    },
    signingKeys,
    commitParser: inputOr("commit_parser", "angular"),
    tagFormat,
    majorOnZero: boolify(inputOr("major_on_zero", "true")),
    buildCommand: core.getInput("build_command"),
    distDirectory: inputOr("dist_directory", "dist"),
    uploadCommand: core.getInput("upload_command"),
    changelogFile: inputOr("changelog_file", "CHANGELOG.md"),
    timeoutMinutes: readTimeout(),
    global: parseGlobalOptions(inputOr("additional_options", "-v")),
    version: parseVersionOptions(core.getInput("version_options")),
    publish: parsePublishOptions(core.getInput("publish_options")),
    env: inheritEnv(env),
  };
}

function maskCredentials({
  githubToken,
  repositoryUsername,
  repositoryPassword,
}: Credentials): void {
  core.setSecret(githubToken);
  if (repositoryUsername) {
    core.setSecret(repositoryUsername);
  }
  if (repositoryPassword) {
    core.setSecret(repositoryPassword);
  }
}

function maskMultiline(secret: string): void {
  for (const line of secret.split(/\r?\n/)) {
    if (line.trim()) {
      core.setSecret(line.trim());
    }
  }
}

export function authenticatedRemoteUrl(
  { owner, repo, serverUrl }: RepositoryRef,
  token: string,
): string {
  const url = new URL(`${serverUrl.replace(/\/+$/, "")}/${owner}/${repo}.git`);
  url.username = "x-access-token";
  url.password = token;
  return url.toString();
}

export async function createOrchestrator(
  config: ReleaseConfig,
  lock: ProjectLock = kProjectLock,
): Promise<ReleaseOrchestrator> {
  const gitPath = await io.which("git", false);
  if (!gitPath) {
    throw new ConfigurationError("git is not installed");
  }
  const { directory, repository, credentials, global, version, publish } =
    config;
  const git = new Git(directory);
  const history = new GitHistoryReader(git, directory !== ".");
  const builder = config.buildCommand
    ? new CommandArtifactBuilder({
        command: config.buildCommand,
        cwd: directory,
        distDirectory: config.distDirectory,
        removeDist: publish.removeDist,
        env: config.env,
      })
    : null;
  const uploader =
    publish.uploadToRepository && config.uploadCommand
      ? new CommandRepositoryClient(config.uploadCommand, directory, config.env)
      : null;
  const releases = new GithubReleaseClient(
    getOctokit(credentials.githubToken),
    repository.owner,
    repository.repo,
  );
  const publisher = new GitPublisher(git, releases, uploader, {
    branch: config.branch,
    remoteUrl: authenticatedRemoteUrl(repository, credentials.githubToken),
    committer: config.committer,
    credentials,
    signingKeys: config.signingKeys,
    commit: version.commit,
    changelogFile: version.changelog ? config.changelogFile : null,
    uploadToRelease: publish.uploadToRelease,
  });
  return new ReleaseOrchestrator(
    {
      history,
      classifier: getClassifier(config.commitParser),
      builder,
      publisher,
      lock,
    },
    {
      projectKey: projectKey({ ...repository, directory }),
      tagFormat: config.tagFormat,
      majorOnZero: config.majorOnZero,
      forceCategory: version.forceCategory,
      prereleaseToken: version.prerelease ? version.prereleaseToken : undefined,
      noop: global.noop,
      build: publish.build,
      verbosity: global.verbosity,
      timeoutMinutes: config.timeoutMinutes,
      repository,
    },
  );
}

export function setPlanOutputs(plan: ReleasePlan | null): void {
  core.setOutput("released", plan ? "true" : "false");
  if (plan) {
    core.setOutput("version", formatVersion(plan.version));
    core.setOutput("tag", plan.tag);
    core.setOutput("release_notes", plan.notes);
  }
}

function outcomePlan(outcome: ReleaseOutcome): ReleasePlan | null {
  return outcome.state === "done" && !outcome.noop ? outcome.plan : null;
}

/** Computes the next version and exposes it as outputs without publishing. */
export async function runVersion(): Promise<void> {
  const config = readConfig();
  const orchestrator = await createOrchestrator(config);
  const plan = await orchestrator.plan();
  setPlanOutputs(plan);
}

export async function run(): Promise<void> {
  const config = readConfig();
  if (config.global.noop) {
    core.info("Running in no-operation mode: nothing will be pushed or uploaded.");
  }
  const orchestrator = await createOrchestrator(config);
  const outcome = await orchestrator.release();
  setPlanOutputs(outcomePlan(outcome));
}
