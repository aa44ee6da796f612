/**
 * Core domain types for scheduler log events.
 *
 * These types define the canonical shape of a parsed log line as it
 * flows from the tailers to the dispatcher. They carry no framework
 * dependencies.
 */

/** Which log directory an event was read from. */
export type LogSource = 'server' | 'accounting';

/**
 * Local date-time with second precision, no time zone:
 * `YYYY-MM-DDTHH:MM:SS`. Lexicographic order is chronological order.
 */
export type LocalTimestamp = string;

/** A line from `server_logs`. */
export interface ServerLogEvent {
  readonly source: 'server';
  readonly timestamp: LocalTimestamp;
  readonly logType: string;
  readonly server: string;
  readonly section: string;
  readonly about: string;
  readonly message: string;
}

/** Job properties of an accounting record, e.g. `queue=default`. */
export type JobProperties = Readonly<Record<string, string>>;

/** A line from `server_priv/accounting`. */
export interface AccountingLogEvent {
  readonly source: 'accounting';
  readonly timestamp: LocalTimestamp;
  readonly jobId: string;
  readonly state: string;
  readonly properties: JobProperties;
}

export type LogEvent = ServerLogEvent | AccountingLogEvent;
