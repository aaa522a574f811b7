/**
 * Base class for errors the harness raises on purpose.
 * `code` is stable and safe to show to callers; the message is human-readable.
 */
export class HarnessError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A Feature id that does not exist in the Backlog
 */
export class FeatureNotFoundError extends HarnessError {
  constructor(public readonly featureId: string) {
    super(`Feature ${featureId} not found`, 'FEATURE_NOT_FOUND');
  }
}

/**
 * A progress ledger read or write that failed at the filesystem level
 */
export class ProgressLedgerError extends HarnessError {
  constructor(message: string, cause: unknown) {
    super(message, 'PROGRESS_IO', { cause });
  }
}

/**
 * A backlog file (or remote payload) that is missing or fails validation
 */
export class BacklogLoadError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, 'BACKLOG_INVALID', { cause });
  }
}
