import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { LogEvent, LogSource } from '../../domain/index.js';
import { FilesystemWatchFailedError } from '../../domain/index.js';
import { LINE_PARSERS, TailBuffer, selectReplayWindow, type FileWithMtime } from '../../application/index.js';
import type { TailerHandoff } from './directory-tailer.js';
import { listLogFiles } from './list-files.js';

export interface DirectoryReplay {
  readonly source: LogSource;
  readonly events: LogEvent[];
  /** Where the live tailer resumes; null when the directory is empty. */
  readonly handoff: TailerHandoff | null;
}

const NEWLINE = 0x0a;

/**
 * Reads the replay window of one directory and parses every line.
 *
 * Older files are consumed whole. The newest file is consumed only up
 * to its last line break: that byte position becomes the hand-off
 * offset, so a line still being written is read once, by the live
 * tailer. Unparsable lines are logged and skipped.
 */
export async function replayDirectory(opts: {
  directory: string;
  source: LogSource;
  count: number;
  log: Logger;
}): Promise<DirectoryReplay> {
  const { directory, source, count, log } = opts;
  const parse = LINE_PARSERS[source];

  let files: FileWithMtime[];
  try {
    files = await listLogFiles(directory);
  } catch (err: unknown) {
    throw new FilesystemWatchFailedError(directory, { cause: err });
  }

  const window = selectReplayWindow(files, count);
  const events: LogEvent[] = [];
  let handoff: TailerHandoff | null = null;
  let skipped = 0;

  for (const [i, file] of window.entries()) {
    const isNewest = i === window.length - 1;
    const content = await readFile(file.path);
    const end = isNewest ? content.lastIndexOf(NEWLINE) + 1 : content.length;

    const buffer = new TailBuffer();
    const lines = buffer.feed(content.subarray(0, end).toString('utf8'));
    if (buffer.pendingFragment !== '') lines.push(buffer.pendingFragment);

    for (const line of lines) {
      if (line.trim() === '') continue;
      const result = parse(line);
      if (result.ok) {
        events.push(result.event);
      } else {
        skipped++;
        log.warn({ err: result.error, file: file.path }, 'Skipping unparsable log line during replay');
      }
    }

    if (isNewest) {
      handoff = { path: file.path, offset: end };
    }
  }

  log.info(
    { directory, source, files: window.length, events: events.length, skipped },
    'Directory replayed',
  );

  return { source, events, handoff };
}
