import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { AccountingLogEvent, ServerLogEvent } from '../../src/domain/index.js';
import { STOP_SIGNAL, type EventQueue } from '../../src/application/event-queue.js';
import type {
  DirectoryWatcher,
  DirectoryWatcherHandlers,
} from '../../src/infrastructure/tailer/directory-watcher.js';

/** Minimal fake logger; `child()` returns the same fake. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** In-process stand-in for a filesystem watch. */
export class FakeDirectoryWatcher implements DirectoryWatcher {
  handlers: DirectoryWatcherHandlers | null = null;
  closed = false;
  startError: Error | null = null;

  async start(handlers: DirectoryWatcherHandlers): Promise<void> {
    if (this.startError) throw this.startError;
    this.handlers = handlers;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  created(path: string): void {
    this.handlers?.onChange({ kind: 'created', path });
  }

  modified(path: string): void {
    this.handlers?.onChange({ kind: 'modified', path });
  }

  fail(err: Error): void {
    this.handlers?.onError(err);
  }
}

export function makeTmpDir(prefix = 'relay-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Server log line stamped 02/27/2015 01:00:SS. */
export function serverLine(second: number, message: string): string {
  const ss = String(second).padStart(2, '0');
  return `02/27/2015 01:00:${ss};0100;PBS_Server.23657;Job;1.host;${message}`;
}

/** Accounting line stamped 02/27/2015 01:00:SS. */
export function accountingLine(second: number, jobId: string, state = 'Q'): string {
  const ss = String(second).padStart(2, '0');
  return `02/27/2015 01:00:${ss};${state};${jobId};queue=default`;
}

export function makeServerEvent(timestamp: string, message = 'msg'): ServerLogEvent {
  return {
    source: 'server',
    timestamp,
    logType: '0100',
    server: 'PBS_Server.1',
    section: 'Job',
    about: '1.host',
    message,
  };
}

export function makeAccountingEvent(timestamp: string, jobId = '1.host'): AccountingLogEvent {
  return {
    source: 'accounting',
    timestamp,
    jobId,
    state: 'Q',
    properties: {},
  };
}

/** Pulls everything currently queued, dropping stop signals. */
export async function drain<T>(queue: EventQueue<T>): Promise<T[]> {
  const items: T[] = [];
  while (queue.size > 0) {
    const item = await queue.pull();
    if (item !== STOP_SIGNAL) items.push(item);
  }
  return items;
}
