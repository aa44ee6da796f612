/**
 * Error taxonomy for the relay.
 *
 * Per-line parse failures are recovered where they occur (logged and
 * skipped). Structural and watch failures are fatal for the unit that
 * raised them and end the process.
 */

export type RelayErrorCode =
  | 'MalformedTimestamp'
  | 'MalformedServerLine'
  | 'MalformedAccountingLine'
  | 'UnexpectedConcurrentWrite'
  | 'SinkDeliveryFailed'
  | 'FilesystemWatchFailed';

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;
}

/** Base for failures tied to a single raw line. */
export abstract class LineParseError extends RelayError {
  constructor(
    message: string,
    readonly line: string,
  ) {
    super(message);
  }
}

export class MalformedTimestampError extends LineParseError {
  readonly code = 'MalformedTimestamp';
  override readonly name = 'MalformedTimestampError';
}

export class MalformedServerLineError extends LineParseError {
  readonly code = 'MalformedServerLine';
  override readonly name = 'MalformedServerLineError';
}

export class MalformedAccountingLineError extends LineParseError {
  readonly code = 'MalformedAccountingLine';
  override readonly name = 'MalformedAccountingLineError';
}

/** A file other than the active one was written in a watched directory. */
export class UnexpectedConcurrentWriteError extends RelayError {
  readonly code = 'UnexpectedConcurrentWrite';
  override readonly name = 'UnexpectedConcurrentWriteError';

  constructor(
    readonly directory: string,
    readonly activeFile: string,
    readonly modifiedFile: string,
  ) {
    super(`Unexpected modifications to ${modifiedFile} while tailing ${activeFile}`);
  }
}

export class SinkDeliveryFailedError extends RelayError {
  readonly code = 'SinkDeliveryFailed';
  override readonly name = 'SinkDeliveryFailedError';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class FilesystemWatchFailedError extends RelayError {
  readonly code = 'FilesystemWatchFailed';
  override readonly name = 'FilesystemWatchFailedError';

  constructor(
    readonly directory: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to watch directory ${directory}`, options);
  }
}
