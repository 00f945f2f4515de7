import * as core from "@actions/core";
import type * as gh from "@actions/github/lib/utils";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";

type Github = InstanceType<typeof gh.GitHub>;

export type CreatedRelease = {
  id: number;
  url: string;
  uploadUrl: string;
};

export interface ReleaseClient {
  createRelease(params: {
    tag: string;
    body: string;
    prerelease: boolean;
  }): Promise<CreatedRelease>;
  uploadAsset(release: CreatedRelease, file: string): Promise<void>;
}

export class GithubReleaseClient implements ReleaseClient {
  constructor(
    private readonly github: Github,
    private readonly owner: string,
    private readonly repo: string,
  ) {}

  async createRelease({
    tag,
    body,
    prerelease,
  }: {
    tag: string;
    body: string;
    prerelease: boolean;
  }): Promise<CreatedRelease> {
    const { owner, repo } = this;
    core.info(`Creating release ${owner}/${repo}@${tag}...`);
    const resp = await this.github.rest.repos.createRelease({
      owner,
      repo,
      tag_name: tag,
      name: tag,
      body,
      prerelease,
    });
    const { id, html_url, upload_url } = resp.data;
    core.info(`Release created: ${html_url}`);
    return { id, url: html_url, uploadUrl: upload_url };
  }

  async uploadAsset(release: CreatedRelease, file: string): Promise<void> {
    const name = basename(file);
    const data = await readFile(file);
    // upload_url is a URI template: https://uploads.github.com/...{?name,label}
    const url = `${release.uploadUrl.replace(/\{[^}]*\}$/, "")}?name=${encodeURIComponent(name)}`;
    core.info(`Uploading release asset ${name}...`);
    await this.github.request(`POST ${url}`, {
      headers: {
        "content-type": "application/octet-stream",
        "content-length": data.length,
      },
      data,
    });
  }
}
