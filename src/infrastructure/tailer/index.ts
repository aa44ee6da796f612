export { DirectoryTailer } from './directory-tailer.js';
export type { TailerHandoff, TailerSnapshot, TailerState, DirectoryTailerOptions } from './directory-tailer.js';
export { ChokidarDirectoryWatcher, createChokidarWatcherFactory } from './directory-watcher.js';
export type {
  DirectoryChange,
  DirectoryWatcher,
  DirectoryWatcherFactory,
  DirectoryWatcherHandlers,
  ChokidarWatcherOptions,
} from './directory-watcher.js';
export { replayDirectory } from './replay.js';
export type { DirectoryReplay } from './replay.js';
export { LogCollector } from './log-collector.js';
export type { LogCollectorOptions, WatchedDirectory } from './log-collector.js';
