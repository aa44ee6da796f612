export {
  parseServerLine,
  parseAccountingLine,
  parseLogTimestamp,
  parseJobProperties,
  splitCapped,
  LINE_PARSERS,
} from './line-parser.js';
export type { ParseResult, LineParser } from './line-parser.js';
export { TailBuffer } from './tail-buffer.js';
export { EventQueue, STOP_SIGNAL } from './event-queue.js';
export type { QueueItem } from './event-queue.js';
export { mergeByTimestamp, selectReplayWindow, DEFAULT_REPLAY_FILES } from './replay-merger.js';
export type { FileWithMtime } from './replay-merger.js';
