import type { HeapMode } from "../types.js";

export type UndoEntry<T> =
  | { kind: "set"; index: number; previous: T }
  | { kind: "append" }
  | { kind: "removeLast"; value: T }
  | { kind: "truncate"; items: T[] }
  | { kind: "mode"; previous: HeapMode };

export interface JournalTarget<T> {
  readonly storage: T[];
  restoreMode(mode: HeapMode): void;
}

/**
 * Undo log for one mutating operation.
 *
 * Writes are recorded as they happen; `rollback` replays them in reverse,
 * which restores storage (and mode) exactly as they were before the operation.
 */
export class MutationJournal<T> {
  private readonly entries: UndoEntry<T>[] = [];

  record(entry: UndoEntry<T>): void {
    this.entries.push(entry);
  }

  rollback(target: JournalTarget<T>): void {
    const a = target.storage;
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const e = this.entries[i];
      switch (e.kind) {
        case "set":
          a[e.index] = e.previous;
          break;
        case "append":
          a.length -= 1;
          break;
        case "removeLast":
          a.push(e.value);
          break;
        case "truncate":
          a.length = 0;
          for (const item of e.items) a.push(item);
          break;
        case "mode":
          target.restoreMode(e.previous);
          break;
      }
    }
    this.entries.length = 0;
  }
}
