export type ReleaseErrorKind = "configuration" | "history" | "publish" | "timeout";

export abstract class ReleaseError extends Error {
  abstract readonly kind: ReleaseErrorKind;
}

export class ConfigurationError extends ReleaseError {
  readonly kind = "configuration";
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class HistoryAccessError extends ReleaseError {
  readonly kind = "history";
  constructor(message: string) {
    super(message);
    this.name = "HistoryAccessError";
  }
}

/**
 * A failure while building, tagging, pushing or uploading. `pushedTag` is set
 * once the tag has reached the remote, after which the release has to be
 * reconciled by hand.
 */
export class PublishError extends ReleaseError {
  readonly kind = "publish";
  constructor(
    message: string,
    readonly pushedTag?: string,
  ) {
    super(pushedTag ? `${message} (tag ${pushedTag} was already pushed)` : message);
    this.name = "PublishError";
  }
}

export class ReleaseTimeoutError extends ReleaseError {
  readonly kind = "timeout";
  constructor(minutes: number) {
    super(`release did not reach the push within ${minutes} minutes`);
    this.name = "ReleaseTimeoutError";
  }
}
