import { open, stat, type FileHandle } from 'node:fs/promises';
import { resolve } from 'node:path';
import { StringDecoder } from 'node:string_decoder';
import type { Logger } from 'pino';
import type { LogEvent, LogSource } from '../../domain/index.js';
import {
  FilesystemWatchFailedError,
  RelayError,
  UnexpectedConcurrentWriteError,
} from '../../domain/index.js';
import {
  LINE_PARSERS,
  TailBuffer,
  selectReplayWindow,
  type EventQueue,
  type LineParser,
} from '../../application/index.js';
import type { DirectoryChange, DirectoryWatcher } from './directory-watcher.js';
import { listLogFiles } from './list-files.js';

export type TailerState = 'idle' | 'watching' | 'stopped';

/** Where live tailing resumes after replay. */
export interface TailerHandoff {
  readonly path: string;
  readonly offset: number;
}

export interface TailerSnapshot {
  readonly directory: string;
  readonly source: LogSource;
  readonly state: TailerState;
  readonly activeFile: string | null;
  readonly offset: number;
}

export interface DirectoryTailerOptions {
  directory: string;
  source: LogSource;
  queue: EventQueue<LogEvent>;
  watcher: DirectoryWatcher;
  log: Logger;
  /** Called once when the tailer dies of a structural or watch failure. */
  onFatal: (err: RelayError) => void;
}

/**
 * Tails the active log file of one directory.
 *
 * State machine:
 *   idle     --created(p) / modified(p)-->  watching(p, offset 0)
 *   watching --created(q)-->               watching(q, offset 0)   rotation
 *   watching --created(active)-->          read appended bytes
 *   watching --modified(active)-->         read appended bytes
 *   watching --modified(other)-->          stopped                 UnexpectedConcurrentWrite
 *
 * Notifications are handled one at a time in arrival order. Complete
 * lines are parsed with the directory's format and pushed to the queue;
 * unparsable lines are logged and dropped.
 */
export class DirectoryTailer {
  private readonly directory: string;
  private readonly source: LogSource;
  private readonly queue: EventQueue<LogEvent>;
  private readonly watcher: DirectoryWatcher;
  private readonly log: Logger;
  private readonly onFatal: (err: RelayError) => void;
  private readonly parse: LineParser;

  private state: TailerState = 'idle';
  private started = false;
  private activePath: string | null = null;
  private handle: FileHandle | null = null;
  private offset = 0;
  private buffer = new TailBuffer();
  private decoder = new StringDecoder('utf8');
  private chain: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;

  constructor(opts: DirectoryTailerOptions) {
    this.directory = opts.directory;
    this.source = opts.source;
    this.queue = opts.queue;
    this.watcher = opts.watcher;
    this.log = opts.log.child({ component: 'tailer', source: opts.source });
    this.onFatal = opts.onFatal;
    this.parse = LINE_PARSERS[opts.source];
  }

  /**
   * Establishes the directory watch.
   *
   * With a hand-off the tailer starts on that file at the replayed
   * offset. Once the watch is live it reads anything appended since
   * replay, then rotates to the newest file of the directory if one
   * appeared before the watch could report it.
   * Rejects with FilesystemWatchFailedError when the directory cannot
   * be watched.
   */
  async start(handoff: TailerHandoff | null = null): Promise<void> {
    if (this.started) {
      throw new Error(`Tailer for ${this.directory} already started`);
    }
    this.started = true;

    if (handoff) {
      this.activate(resolve(handoff.path), handoff.offset);
    }

    try {
      const st = await stat(this.directory);
      if (!st.isDirectory()) {
        throw new Error(`${this.directory} is not a directory`);
      }
      await this.watcher.start({
        onChange: (change) => this.enqueue(change),
        onError: (err) => {
          this.fail(new FilesystemWatchFailedError(this.directory, { cause: err }));
        },
      });
    } catch (err: unknown) {
      this.state = 'stopped';
      throw new FilesystemWatchFailedError(this.directory, { cause: err });
    }

    this.log.info({ directory: this.directory }, 'Watching directory');

    if (this.activePath !== null) {
      this.schedule(() => this.catchUp());
    }
  }

  /** Releases the watch and the open file; safe to call more than once. */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.state = 'stopped';
    await this.idle();
    await this.release();
    this.log.info({ directory: this.directory }, 'Stopped watching directory');
  }

  /**
   * Resolves once every notification received so far has been handled,
   * including work the handlers themselves scheduled.
   */
  async idle(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.chain;
      await current;
    } while (current !== this.chain);
  }

  snapshot(): TailerSnapshot {
    return {
      directory: this.directory,
      source: this.source,
      state: this.state,
      activeFile: this.activePath,
      offset: this.offset,
    };
  }

  private enqueue(change: DirectoryChange): void {
    this.schedule(() => this.handleChange(change));
  }

  private schedule(task: () => Promise<void>): void {
    this.chain = this.chain.then(async () => {
      if (this.state === 'stopped') return;
      try {
        await task();
      } catch (err: unknown) {
        if (err instanceof RelayError) {
          this.fail(err);
          return;
        }
        // I/O trouble on the active file: the offset has not moved, so
        // the next notification retries the same bytes.
        this.log.error({ err, file: this.activePath }, 'Failed to read active log file');
      }
    });
  }

  private async handleChange(change: DirectoryChange): Promise<void> {
    const path = resolve(change.path);

    if (change.kind === 'created' && path !== this.activePath) {
      this.activate(path, 0);
      await this.readAppended();
      return;
    }

    if (this.activePath === null) {
      this.activate(path, 0);
    } else if (path !== this.activePath) {
      throw new UnexpectedConcurrentWriteError(this.directory, this.activePath, path);
    }
    await this.readAppended();
  }

  /**
   * Bytes appended and files created between replay and the watch going
   * live produce no notification; pick them up here.
   */
  private async catchUp(): Promise<void> {
    await this.readAppended();
    const [newest] = selectReplayWindow(await listLogFiles(this.directory), 1);
    if (newest !== undefined && resolve(newest.path) !== this.activePath) {
      await this.handleChange({ kind: 'created', path: newest.path });
    }
  }

  private activate(path: string, offset: number): void {
    const previous = this.activePath;
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      handle.close().catch((err: unknown) => {
        this.log.warn({ err, file: previous }, 'Failed to close rotated log file');
      });
    }

    this.activePath = path;
    this.offset = offset;
    this.buffer.reset();
    this.decoder = new StringDecoder('utf8');
    this.state = 'watching';

    if (previous !== null) {
      this.log.info({ from: previous, to: path }, 'Log file rotated');
    } else {
      this.log.info({ file: path, offset }, 'Tailing log file');
    }
  }

  private async readAppended(): Promise<void> {
    if (this.activePath === null) return;
    const handle = this.handle ?? (await open(this.activePath, 'r'));
    this.handle = handle;

    const { size } = await handle.stat();
    if (size < this.offset) {
      this.log.warn({ file: this.activePath, offset: this.offset, size }, 'Log file truncated, reading from start');
      this.offset = 0;
      this.buffer.reset();
      this.decoder = new StringDecoder('utf8');
    }
    if (size === this.offset) return;

    const length = size - this.offset;
    const chunk = Buffer.alloc(length);
    const { bytesRead } = await handle.read(chunk, 0, length, this.offset);
    this.offset += bytesRead;

    const text = this.decoder.write(chunk.subarray(0, bytesRead));
    for (const line of this.buffer.feed(text)) {
      this.emit(line);
    }
  }

  private emit(line: string): void {
    if (line.trim() === '') return;
    const result = this.parse(line);
    if (result.ok) {
      this.queue.push(result.event);
    } else {
      this.log.warn({ err: result.error, file: this.activePath }, 'Skipping unparsable log line');
    }
  }

  private fail(err: RelayError): void {
    if (this.state === 'stopped') return;
    this.state = 'stopped';
    this.log.error({ err, directory: this.directory }, 'Tailer failed');
    // A read may still be in flight; release once it has settled.
    this.chain = this.chain
      .then(() => this.release())
      .catch((releaseErr: unknown) => {
        this.log.warn({ err: releaseErr }, 'Failed to release tailer resources');
      });
    this.onFatal(err);
  }

  private async release(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await this.watcher.close();
    if (handle) await handle.close();
  }
}
