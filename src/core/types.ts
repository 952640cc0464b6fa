/** Shared core types used by module contracts. */

export type HeapMode = "min" | "max";

/**
 * How a NaN key is normalized before comparison.
 * - `raise`: reject the value
 * - `min`: treat as -Infinity
 * - `max`: treat as +Infinity
 */
export type NanPolicy = "raise" | "min" | "max";

/** A totally ordered key (modulo NaN). */
export type HeapKey = number | bigint | string;

export type KeyFn<T> = (value: T) => HeapKey;

export type HeapEvent =
  | "insert_start"
  | "insert"
  | "push_done"
  | "insert_error"
  | "pop_empty"
  | "pop_start"
  | "pop_root"
  | "move"
  | "pop_done"
  | "pop_error"
  | "clear"
  | "extend"
  | "heapify_done"
  | "toggle_mode"
  | "set_mode"
  | "remove_value"
  | "remove_at"
  | "compare"
  | "swap"
  | "replace_root"
  | "merge";

/** Snapshot handed to observers; long values are already truncated. */
export type EventAttributes = Readonly<Record<string, unknown>>;

export interface Logger {
  warn(message: string, ...meta: unknown[]): void;
}

export interface HeapStats {
  size: number;
  depth: number;
  mode: HeapMode;
  isValid: boolean;
  isPerfect: boolean;
  /** completed mutating operations since construction */
  operationsCount: number;
}
