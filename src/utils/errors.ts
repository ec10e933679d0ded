/**
 * Errors that abort a whole run. Per-file problems are never raised as errors.
 */

export class SourceRootNotFoundError extends Error {
  constructor(readonly sourceRoot: string) {
    super(`Source repository not found at ${sourceRoot}`);
    this.name = "SourceRootNotFoundError";
  }
}

export class SourceLayoutError extends Error {
  constructor(
    readonly sourceRoot: string,
    readonly candidates: readonly string[]
  ) {
    super(
      `Could not find applications directory in ${sourceRoot}\n` +
        `Expected: ${candidates.join(" or ")}`
    );
    this.name = "SourceLayoutError";
  }
}

export class SourceFetchError extends Error {
  constructor(message: string, readonly detail?: string) {
    super(detail ? `${message}: ${detail}` : message);
    this.name = "SourceFetchError";
  }
}
