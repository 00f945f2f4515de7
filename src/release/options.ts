import { parseStringToArgs } from "../util/args";
import { ConfigurationError } from "./errors";
import { isPrereleaseToken } from "./version";

export type GlobalOptions = {
  verbosity: number;
  noop: boolean;
};

export type VersionOptions = {
  forceCategory?: "major" | "minor" | "patch";
  commit: boolean;
  changelog: boolean;
  prerelease: boolean;
  prereleaseToken: string;
};

export type PublishOptions = {
  uploadToRepository: boolean;
  uploadToRelease: boolean;
  build: boolean;
  /** Empty the dist directory before building. */
  removeDist: boolean;
};

export const kDefaultPrereleaseToken = "rc";

function unknownFlag(input: string, flag: string): ConfigurationError {
  return new ConfigurationError(`unknown flag in ${input}: ${flag}`);
}

export function parseGlobalOptions(raw: string): GlobalOptions {
  const opts: GlobalOptions = { verbosity: 0, noop: false };
  for (const flag of parseStringToArgs(raw)) {
    if (/^-v+$/.test(flag)) {
      opts.verbosity = Math.min(2, opts.verbosity + flag.length - 1);
    } else if (flag === "--verbose") {
      opts.verbosity = Math.min(2, opts.verbosity + 1);
    } else if (flag === "--noop") {
      opts.noop = true;
    } else {
      throw unknownFlag("additional_options", flag);
    }
  }
  return opts;
}

const kForceFlags = new Map<string, "major" | "minor" | "patch">([
  ["--major", "major"],
  ["--minor", "minor"],
  ["--patch", "patch"],
]);

function readPrereleaseToken(token: string | undefined): string {
  if (!token || !isPrereleaseToken(token)) {
    throw new ConfigurationError(
      `--prerelease-token needs a token of letters, digits and hyphens: ${token ?? ""}`,
    );
  }
  return token;
}

export function parseVersionOptions(raw: string): VersionOptions {
  const opts: VersionOptions = {
    commit: true,
    changelog: true,
    prerelease: false,
    prereleaseToken: kDefaultPrereleaseToken,
  };
  const flags = parseStringToArgs(raw);
  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i];
    const force = kForceFlags.get(flag);
    if (force) {
      if (opts.forceCategory && opts.forceCategory !== force) {
        throw new ConfigurationError(
          "only one of --major, --minor and --patch can be given",
        );
      }
      opts.forceCategory = force;
    } else if (flag === "--no-commit") {
      opts.commit = false;
    } else if (flag === "--no-changelog") {
      opts.changelog = false;
    } else if (flag === "--prerelease") {
      opts.prerelease = true;
    } else if (flag === "--prerelease-token") {
      i += 1;
      opts.prereleaseToken = readPrereleaseToken(flags[i]);
    } else if (flag.startsWith("--prerelease-token=")) {
      opts.prereleaseToken = readPrereleaseToken(
        flag.slice("--prerelease-token=".length),
      );
    } else {
      throw unknownFlag("version_options", flag);
    }
  }
  return opts;
}

export function parsePublishOptions(raw: string): PublishOptions {
  const opts: PublishOptions = {
    uploadToRepository: true,
    uploadToRelease: true,
    build: true,
    removeDist: true,
  };
  for (const flag of parseStringToArgs(raw)) {
    if (flag === "--no-upload-to-repository") {
      opts.uploadToRepository = false;
    } else if (flag === "--no-upload-to-release") {
      opts.uploadToRelease = false;
    } else if (flag === "--no-build") {
      opts.build = false;
    } else if (flag === "--no-remove-dist") {
      opts.removeDist = false;
    } else {
      throw unknownFlag("publish_options", flag);
    }
  }
  return opts;
}
