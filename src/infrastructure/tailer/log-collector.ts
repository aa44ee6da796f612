import type { Logger } from 'pino';
import type { LogEvent, LogSource, RelayError } from '../../domain/index.js';
import { mergeByTimestamp, type EventQueue } from '../../application/index.js';
import { DirectoryTailer, type TailerSnapshot } from './directory-tailer.js';
import type { DirectoryWatcherFactory } from './directory-watcher.js';
import { replayDirectory, type DirectoryReplay } from './replay.js';

export interface WatchedDirectory {
  readonly source: LogSource;
  readonly directory: string;
}

export interface LogCollectorOptions {
  /** Order matters: on equal timestamps, earlier directories replay first. */
  directories: readonly WatchedDirectory[];
  queue: EventQueue<LogEvent>;
  log: Logger;
  replayFiles: number;
  createWatcher: DirectoryWatcherFactory;
  onFatal: (err: RelayError) => void;
}

/**
 * Replays recent history of every watched directory, then hands each
 * directory to a live tailer.
 *
 * Startup order:
 * 1) replay each directory (its newest files, parsed)
 * 2) merge all replays by timestamp and push them to the queue
 * 3) start one tailer per directory at its replay hand-off offset
 *
 * Every replayed event is queued before any tailer can push, so the
 * startup history reaches the dispatcher in timestamp order. Live
 * events from different directories interleave in arrival order.
 */
export class LogCollector {
  private readonly opts: LogCollectorOptions;
  private readonly log: Logger;
  private tailers: DirectoryTailer[] = [];
  private started = false;

  constructor(opts: LogCollectorOptions) {
    this.opts = opts;
    this.log = opts.log.child({ component: 'collector' });
  }

  /** Returns the number of replayed events queued. */
  async start(): Promise<number> {
    if (this.started) {
      throw new Error('Log collector already started');
    }
    this.started = true;

    const replays: DirectoryReplay[] = [];
    for (const { source, directory } of this.opts.directories) {
      this.log.info({ source, directory }, 'Collecting log messages');
      replays.push(
        await replayDirectory({ directory, source, count: this.opts.replayFiles, log: this.log }),
      );
    }

    const merged = mergeByTimestamp(replays.map((r) => r.events));
    this.opts.queue.pushAll(merged);
    this.log.info({ events: merged.length }, 'Replay queued');

    for (const [i, { source, directory }] of this.opts.directories.entries()) {
      const tailer = new DirectoryTailer({
        directory,
        source,
        queue: this.opts.queue,
        watcher: this.opts.createWatcher(directory),
        log: this.opts.log,
        onFatal: this.opts.onFatal,
      });
      this.tailers.push(tailer);
      await tailer.start(replays[i]?.handoff ?? null);
    }

    return merged.length;
  }

  /** Stops every tailer; safe to call more than once. */
  async stop(): Promise<void> {
    await Promise.all(this.tailers.map((t) => t.stop()));
  }

  /** Resolves once every tailer has handled the notifications it received. */
  async idle(): Promise<void> {
    await Promise.all(this.tailers.map((t) => t.idle()));
  }

  snapshot(): TailerSnapshot[] {
    return this.tailers.map((t) => t.snapshot());
  }
}
