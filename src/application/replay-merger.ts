import type { LogEvent } from '../domain/index.js';

/** Default number of most recent files replayed per directory. */
export const DEFAULT_REPLAY_FILES = 7;

export interface FileWithMtime {
  readonly path: string;
  readonly mtimeMs: number;
}

/**
 * Picks the replay window of a directory: the `count` most recently
 * modified files, returned oldest first. Equal mtimes are ordered by
 * path so the window is deterministic.
 */
export function selectReplayWindow(
  files: readonly FileWithMtime[],
  count: number = DEFAULT_REPLAY_FILES,
): FileWithMtime[] {
  if (count <= 0) return [];
  const ordered = [...files].sort(
    (a, b) => a.mtimeMs - b.mtimeMs || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0),
  );
  return ordered.slice(-count);
}

/**
 * Stable k-way merge of already chronological sequences.
 *
 * At each step the head with the smallest timestamp is taken; among
 * equal timestamps the earlier sequence wins, so every input keeps its
 * relative order and ties resolve first-seen-first-emitted.
 */
export function mergeByTimestamp<E extends LogEvent>(
  sequences: readonly (readonly E[])[],
): E[] {
  const cursors = sequences.map(() => 0);
  const total = sequences.reduce((n, seq) => n + seq.length, 0);
  const merged: E[] = [];

  while (merged.length < total) {
    let best = -1;
    let bestEvent: E | undefined;

    for (let i = 0; i < sequences.length; i++) {
      const candidate = sequences[i]?.[cursors[i] ?? 0];
      if (candidate === undefined) continue;
      if (bestEvent === undefined || candidate.timestamp < bestEvent.timestamp) {
        best = i;
        bestEvent = candidate;
      }
    }

    if (bestEvent === undefined) break;
    merged.push(bestEvent);
    cursors[best] = (cursors[best] ?? 0) + 1;
  }

  return merged;
}
