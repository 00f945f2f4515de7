import * as core from "@actions/core";
import * as exec from "@actions/exec";
import * as io from "@actions/io";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { parseStringToArgs } from "../util/args";
import { PublishError } from "./errors";
import type { ReleasePlan } from "./types";
import { formatVersion } from "./version";

export interface ArtifactBuilder {
  /** Builds the release artifacts and returns their paths. */
  build(plan: ReleasePlan): Promise<string[]>;
}

export class CommandArtifactBuilder implements ArtifactBuilder {
  constructor(
    private readonly params: {
      command: string;
      cwd: string;
      distDirectory: string;
      /** Empty `distDirectory` first so only this build's files are collected. */
      removeDist: boolean;
      env: Record<string, string>;
    },
  ) {}

  async build(plan: ReleasePlan): Promise<string[]> {
    const { command, cwd, distDirectory, removeDist, env } = this.params;
    const [tool, ...args] = parseStringToArgs(command);
    if (!tool) {
      return [];
    }
    const dist = join(cwd, distDirectory);
    if (removeDist) {
      core.debug(`Removing ${dist}`);
      await io.rmRF(dist);
    }
    core.info(`Building ${plan.tag}: ${command}`);
    const code = await exec.exec(tool, args, {
      cwd,
      ignoreReturnCode: true,
      env: { ...env, NEW_VERSION: formatVersion(plan.version) },
    });
    if (code !== 0) {
      throw new PublishError(`build command failed with exit code ${code}`);
    }
    return collectArtifacts(dist);
  }
}

export async function collectArtifacts(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true }).catch(
    (e: unknown) => {
      const message = e instanceof Error ? e.message : String(e);
      throw new PublishError(`cannot read artifacts from ${dir}: ${message}`);
    },
  );
  return entries
    .filter((e) => e.isFile())
    .map((e) => join(dir, e.name))
    .sort();
}
