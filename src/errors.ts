// ---------------------------------------------------------------------------
// Error types shared across the cleanup job
// ---------------------------------------------------------------------------

/**
 * Raised when required configuration is missing or invalid, or when the
 * directory credential cannot be built. Fatal at startup.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly key?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The directory answered with a payload that does not match its contract. */
export class DirectoryResponseError extends Error {
  constructor(
    message: string,
    readonly endpoint: string,
  ) {
    super(message);
    this.name = 'DirectoryResponseError';
  }
}

export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

export class RunInProgressError extends Error {
  constructor(readonly runId: number | null) {
    super(
      runId === null
        ? 'A cleanup run is already in progress.'
        : `Cleanup run ${runId} is already in progress.`,
    );
    this.name = 'RunInProgressError';
  }
}
