import * as core from "@actions/core";
import * as exec from "@actions/exec";
import { parseStringToArgs } from "../util/args";
import { ConfigurationError, PublishError } from "./errors";
import type { Credentials } from "./types";

export interface RepositoryClient {
  readonly name: string;
  /** Throws a ConfigurationError when an upload could not be attempted. */
  verify(credentials: Credentials): void;
  upload(files: string[], credentials: Credentials): Promise<void>;
}

/**
 * Uploads through an external tool. Credentials reach the tool only through
 * REPOSITORY_USERNAME and REPOSITORY_PASSWORD in its environment.
 */
export class CommandRepositoryClient implements RepositoryClient {
  readonly name: string;
  private readonly tool: string;
  private readonly args: string[];

  constructor(
    command: string,
    private readonly cwd: string,
    private readonly env: Record<string, string>,
  ) {
    const [tool = "", ...args] = parseStringToArgs(command);
    this.name = tool;
    this.tool = tool;
    this.args = args;
  }

  verify(credentials: Credentials): void {
    if (!this.tool) {
      throw new ConfigurationError("upload_command is empty");
    }
    if (!credentials.repositoryUsername || !credentials.repositoryPassword) {
      throw new ConfigurationError(
        "repository_username and repository_password are required to upload to the package repository",
      );
    }
  }

  async upload(files: string[], credentials: Credentials): Promise<void> {
    this.verify(credentials);
    if (files.length === 0) {
      core.warning("No artifacts to upload to the package repository.");
      return;
    }
    core.info(`Uploading ${files.length} artifact(s) with ${this.name}...`);
    const code = await exec.exec(this.tool, [...this.args, ...files], {
      cwd: this.cwd,
      ignoreReturnCode: true,
      env: {
        ...this.env,
        REPOSITORY_USERNAME: credentials.repositoryUsername ?? "",
        REPOSITORY_PASSWORD: credentials.repositoryPassword ?? "",
      },
    });
    if (code !== 0) {
      throw new PublishError(`${this.name} upload failed with exit code ${code}`);
    }
  }
}
