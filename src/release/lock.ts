/**
 * Keyed async mutex. Calls sharing a key run one after another in call order;
 * a rejected call does not block the ones queued behind it.
 */
export class ProjectLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const result = prev.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export const kProjectLock = new ProjectLock();

export function projectKey({
  owner,
  repo,
  directory,
}: {
  owner: string;
  repo: string;
  directory: string;
}): string {
  const dir = directory.replace(/^\.(\/|$)/, "").replace(/\/+$/, "") || ".";
  return `${owner}/${repo}:${dir}`;
}
