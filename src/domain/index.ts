export type {
  LogEvent,
  LogSource,
  LocalTimestamp,
  ServerLogEvent,
  AccountingLogEvent,
  JobProperties,
} from './event.js';
export {
  RelayError,
  LineParseError,
  MalformedTimestampError,
  MalformedServerLineError,
  MalformedAccountingLineError,
  UnexpectedConcurrentWriteError,
  SinkDeliveryFailedError,
  FilesystemWatchFailedError,
} from './errors.js';
export type { RelayErrorCode } from './errors.js';
