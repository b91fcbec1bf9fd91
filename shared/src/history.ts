export const HISTORY_CAPACITY = 2500;

export interface HistorySlice {
  lines: string[];
  /** Cursor to pass on the next read. */
  next: number;
  /** Lines between the requested cursor and the oldest retained one, already evicted. */
  missed: number;
}

/**
 * Most-recent-N output lines of one job. Written by exactly one pipeline,
 * read by any number of viewers through absolute cursors: a cursor counts
 * every line ever appended, so eviction at the front never shifts it.
 */
export class HistoryBuffer {
  private lines: string[] = [];
  private evicted = 0;

  constructor(readonly capacity: number = HISTORY_CAPACITY) {}

  push(line: string): void {
    this.lines.push(line);
    while (this.lines.length > this.capacity) {
      this.lines.shift();
      this.evicted++;
    }
  }

  /** Lines currently retained. */
  get length(): number {
    return this.lines.length;
  }

  /** Lines ever appended, retained or not. */
  get total(): number {
    return this.evicted + this.lines.length;
  }

  since(cursor: number): HistorySlice {
    const start = Math.max(cursor - this.evicted, 0);
    return {
      lines: this.lines.slice(start),
      next: this.total,
      missed: Math.max(this.evicted - cursor, 0),
    };
  }

  toArray(): string[] {
    return [...this.lines];
  }
}
