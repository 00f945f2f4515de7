import * as core from "@actions/core";
import { ConfigurationError } from "../release/errors";

export function assertInput(name: string): string {
  const v = core.getInput(name);
  if (!v) {
    throw new ConfigurationError(`${name} is required`);
  }
  return v;
}

export function boolify(s: string): boolean {
  return s !== "" && !s.match(/^(false|0|undefined|null)$/i);
}

export function parseRef(ref: string): string {
  // refs/heads/master -> master
  // refs/tags/v0.1.0 -> v0.1.0
  const m = ref.match(/^refs\/.+?\/(.+?)$/);
  if (m) {
    return m[1];
  }
  return ref;
}

export function parseRepository(repository: string | undefined): {
  owner: string;
  repo: string;
} {
  const m = repository?.match(/^(.+?)\/(.+?)$/);
  if (!m) {
    throw new ConfigurationError(`GITHUB_REPOSITORY is not set or invalid: ${repository}`);
  }
  return { owner: m[1], repo: m[2] };
}
