import type {
  AccountingLogEvent,
  LocalTimestamp,
  LogEvent,
  LogSource,
  ServerLogEvent,
} from '../domain/index.js';
import {
  MalformedAccountingLineError,
  MalformedServerLineError,
  MalformedTimestampError,
  type LineParseError,
} from '../domain/index.js';

/**
 * Result of parsing one raw log line.
 *
 * `ok === false` carries the typed failure so the caller decides how to
 * surface it; parsing itself never throws.
 */
export type ParseResult<E extends LogEvent = LogEvent> =
  | { readonly ok: true; readonly event: E }
  | { readonly ok: false; readonly error: LineParseError };

export type LineParser<E extends LogEvent = LogEvent> = (line: string) => ParseResult<E>;

// MM/DD/YYYY HH:MM:SS;rest
const TIMESTAMP_PREFIX = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2});(.*)$/s;

const SERVER_FIELDS = 5;
const ACCOUNTING_FIELDS = 3;

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one.
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Splits `s` on `sep` into at most `limit` parts; the last part keeps
 * any remaining separators.
 */
export function splitCapped(s: string, sep: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = s;
  while (parts.length < limit - 1) {
    const idx = rest.indexOf(sep);
    if (idx === -1) break;
    parts.push(rest.slice(0, idx));
    rest = rest.slice(idx + sep.length);
  }
  parts.push(rest);
  return parts;
}

/**
 * Splits the `MM/DD/YYYY HH:MM:SS;` prefix off a line.
 *
 * Returns the canonical timestamp and the remainder of the line, or a
 * MalformedTimestampError when the prefix is missing or names a
 * date-time that does not exist.
 */
export function parseLogTimestamp(
  line: string,
): { ok: true; timestamp: LocalTimestamp; rest: string } | { ok: false; error: MalformedTimestampError } {
  const m = TIMESTAMP_PREFIX.exec(line);
  if (!m) {
    return {
      ok: false,
      error: new MalformedTimestampError(`Unable to match date on log line: ${line}`, line),
    };
  }

  const [, mm = '', dd = '', yyyy = '', hh = '', mi = '', ss = '', rest = ''] = m;
  const month = Number(mm);
  const day = Number(dd);
  const year = Number(yyyy);
  const hour = Number(hh);
  const minute = Number(mi);
  const second = Number(ss);

  const valid =
    month >= 1 && month <= 12 &&
    day >= 1 && day <= daysInMonth(year, month) &&
    hour <= 23 && minute <= 59 && second <= 59;

  if (!valid) {
    return {
      ok: false,
      error: new MalformedTimestampError(`Invalid date on log line: ${line}`, line),
    };
  }

  const timestamp =
    `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` +
    `T${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}`;

  return { ok: true, timestamp, rest };
}

/**
 * Parses a server activity line.
 *
 * Example:
 * `02/27/2015 00:59:44;0100;PBS_Server.23657;Job;22495[].clusterhn.cluster.com;enqueuing into default, state 1 hop 1`
 */
export function parseServerLine(line: string): ParseResult<ServerLogEvent> {
  const ts = parseLogTimestamp(line);
  if (!ts.ok) return ts;

  const fields = splitCapped(ts.rest, ';', SERVER_FIELDS);
  const [logType, server, section, about, message] = fields;
  if (
    logType === undefined || server === undefined || section === undefined ||
    about === undefined || message === undefined
  ) {
    return {
      ok: false,
      error: new MalformedServerLineError(
        `Expected ${SERVER_FIELDS} fields in server log line, got ${fields.length}`,
        line,
      ),
    };
  }

  return {
    ok: true,
    event: {
      source: 'server',
      timestamp: ts.timestamp,
      logType,
      server,
      section,
      about,
      message,
    },
  };
}

/**
 * Parses the space separated `key=value` list of an accounting record.
 * Values may contain `=`; only the first one separates key from value.
 */
export function parseJobProperties(
  raw: string,
): { ok: true; properties: Record<string, string> } | { ok: false; token: string } {
  const entries: [string, string][] = [];
  for (const token of raw.trimEnd().split(' ')) {
    if (token === '') continue;
    const eq = token.indexOf('=');
    if (eq === -1) return { ok: false, token };
    entries.push([token.slice(0, eq), token.slice(eq + 1)]);
  }
  return { ok: true, properties: Object.fromEntries(entries) };
}

/**
 * Parses an accounting line.
 *
 * Example:
 * `02/26/2015 00:04:48;Q;22320.clusterhn.cluster.com;queue=default`
 */
export function parseAccountingLine(line: string): ParseResult<AccountingLogEvent> {
  const ts = parseLogTimestamp(line);
  if (!ts.ok) return ts;

  const fields = splitCapped(ts.rest, ';', ACCOUNTING_FIELDS);
  const [state, jobId, rawProperties] = fields;
  if (state === undefined || jobId === undefined || rawProperties === undefined) {
    return {
      ok: false,
      error: new MalformedAccountingLineError(
        `Expected ${ACCOUNTING_FIELDS} fields in accounting line, got ${fields.length}`,
        line,
      ),
    };
  }

  const props = parseJobProperties(rawProperties);
  if (!props.ok) {
    return {
      ok: false,
      error: new MalformedAccountingLineError(
        `Property "${props.token}" has no "=" in accounting line`,
        line,
      ),
    };
  }

  return {
    ok: true,
    event: {
      source: 'accounting',
      timestamp: ts.timestamp,
      jobId,
      state,
      properties: props.properties,
    },
  };
}

/** Parser for the line format of each log directory. */
export const LINE_PARSERS: Readonly<Record<LogSource, LineParser>> = {
  server: parseServerLine,
  accounting: parseAccountingLine,
};
