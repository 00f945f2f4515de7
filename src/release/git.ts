import * as exec from "@actions/exec";

export type GitFailure = (detail: string) => Error;

/**
 * Thin wrapper over the git CLI. `config` entries are passed as `-c key=value`
 * on every invocation so nothing is written to the repository's config.
 */
export class Git {
  constructor(
    readonly cwd: string,
    private readonly config: Record<string, string> = {},
  ) {}

  withConfig(config: Record<string, string>): Git {
    return new Git(this.cwd, { ...this.config, ...config });
  }

  async exec(args: string[]): Promise<exec.ExecOutput> {
    const configArgs = Object.entries(this.config).flatMap(([k, v]) => [
      "-c",
      `${k}=${v}`,
    ]);
    return exec.getExecOutput("git", [...configArgs, ...args], {
      cwd: this.cwd,
      ignoreReturnCode: true,
      silent: true,
    });
  }

  async run(args: string[], fail: GitFailure): Promise<string> {
    const { exitCode, stdout, stderr } = await this.exec(args);
    if (exitCode !== 0) {
      const detail = [stdout, stderr].filter(Boolean).join("\n");
      throw fail(`git ${args[0]} failed with exit code ${exitCode}\n${detail}`);
    }
    return stdout;
  }
}
