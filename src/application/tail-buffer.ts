/**
 * Accumulates text read from a growing file and releases only complete
 * lines.
 *
 * Everything up to and including the last `\n` is flushed as lines (the
 * terminator and a trailing `\r` stripped). Whatever follows stays in
 * the pending fragment until a later feed terminates it.
 */
export class TailBuffer {
  private fragment = '';

  /** Bytes read but not yet terminated by a line break. */
  get pendingFragment(): string {
    return this.fragment;
  }

  feed(chunk: string): string[] {
    const buffered = this.fragment + chunk;
    const lastBreak = buffered.lastIndexOf('\n');
    if (lastBreak === -1) {
      this.fragment = buffered;
      return [];
    }

    this.fragment = buffered.slice(lastBreak + 1);
    return buffered
      .slice(0, lastBreak)
      .split('\n')
      .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }

  /** Drops the pending fragment (used on rotation). */
  reset(): void {
    this.fragment = '';
  }
}
