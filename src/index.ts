import * as core from "@actions/core";
import { ConfigurationError } from "./release/errors";
import * as modRelease from "./release/runner";

async function run(runner: () => Promise<void>) {
  try {
    await runner();
  } catch (e) {
    if (e instanceof Error) {
      core.error(e);
    }
    core.setFailed("see error above");
  }
}

export function version() {
  return run(modRelease.runVersion);
}

export function publish() {
  return run(modRelease.run);
}

const kCommands = new Map<string, () => Promise<void>>([
  ["publish", modRelease.run],
  ["version", modRelease.runVersion],
]);

/** Runs the operation named by the `command` input, `publish` by default. */
export function main() {
  return run(async () => {
    const command = core.getInput("command") || "publish";
    const runner = kCommands.get(command);
    if (!runner) {
      throw new ConfigurationError(
        `unknown command: ${command}. Expected publish or version.`,
      );
    }
    await runner();
  });
}
