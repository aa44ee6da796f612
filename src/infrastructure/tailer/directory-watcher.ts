import { watch, type FSWatcher } from 'chokidar';

/** A filesystem notification for one entry of a watched directory. */
export interface DirectoryChange {
  readonly kind: 'created' | 'modified';
  readonly path: string;
}

export interface DirectoryWatcherHandlers {
  onChange(change: DirectoryChange): void;
  /** A failure after the watch was established. */
  onError(err: Error): void;
}

/**
 * Source of directory change notifications.
 *
 * The tailer depends only on this contract, so native events, polling
 * or an in-process fake are interchangeable.
 */
export interface DirectoryWatcher {
  /** Resolves once the watch is established; rejects if it cannot be. */
  start(handlers: DirectoryWatcherHandlers): Promise<void>;
  close(): Promise<void>;
}

export type DirectoryWatcherFactory = (directory: string) => DirectoryWatcher;

export interface ChokidarWatcherOptions {
  usePolling: boolean;
  pollIntervalMs: number;
}

/** Watches the direct children of a directory with chokidar. */
export class ChokidarDirectoryWatcher implements DirectoryWatcher {
  private watcher: FSWatcher | null = null;

  constructor(
    private readonly directory: string,
    private readonly options: ChokidarWatcherOptions,
  ) {}

  start(handlers: DirectoryWatcherHandlers): Promise<void> {
    return new Promise((resolve, reject) => {
      let ready = false;
      const watcher = watch(this.directory, {
        ignoreInitial: true,
        depth: 0,
        persistent: true,
        usePolling: this.options.usePolling,
        interval: this.options.pollIntervalMs,
      });
      this.watcher = watcher;

      watcher.on('add', (path: string) => handlers.onChange({ kind: 'created', path }));
      watcher.on('change', (path: string) => handlers.onChange({ kind: 'modified', path }));
      watcher.on('error', (err: Error) => {
        if (ready) {
          handlers.onError(err);
        } else {
          reject(err);
        }
      });
      watcher.once('ready', () => {
        ready = true;
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
  }
}

export function createChokidarWatcherFactory(options: ChokidarWatcherOptions): DirectoryWatcherFactory {
  return (directory) => new ChokidarDirectoryWatcher(directory, options);
}
