export class OriginalityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Content handed over by the extraction layer is empty or unusable. */
export class UpstreamInputError extends OriginalityError {
  constructor(
    readonly fileName: string,
    readonly reason: string,
  ) {
    super(`${fileName}: ${reason}`);
  }
}

/** A collaborator (retrieval, classification, elaboration) could not be reached. */
export class SubsystemUnavailableError extends OriginalityError {
  constructor(
    readonly subsystem: string,
    message: string,
    readonly retryable = true,
  ) {
    super(`${subsystem} unavailable: ${message}`);
  }
}

export class TimeoutError extends SubsystemUnavailableError {
  constructor(subsystem: string, timeoutMs: number) {
    super(subsystem, `timed out after ${timeoutMs}ms`, true);
  }
}

export class ParseError extends OriginalityError {}

export class MalformedResponseError extends OriginalityError {
  constructor(
    readonly subsystem: string,
    readonly raw: string,
  ) {
    super(`${subsystem} returned a malformed response`);
  }
}

export class InvalidTransitionError extends OriginalityError {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Invalid classifier transition ${from} -> ${to}`);
  }
}

export class NoAnalyzableContentError extends OriginalityError {
  constructor(readonly unanalyzable: Array<{ fileName: string; reason: string }>) {
    super('Submission contains no analyzable content.');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
