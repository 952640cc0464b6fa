import type { EventAttributes, HeapEvent, HeapMode, HeapStats, KeyFn, Logger, NanPolicy } from "./types.js";

/**
 * Receives structural events synchronously, in program order.
 *
 * Contract notes:
 * - called while a mutation is in flight; it may read the heap but any mutating call fails
 * - anything it throws is caught and never reaches the heap's caller
 */
export interface HeapObserver {
  onHeapEvent(event: HeapEvent, attributes: EventAttributes): void;
}

export interface HeapOptions<T> {
  mode?: HeapMode;
  /** Projection to a comparable key. Identity when omitted. */
  key?: KeyFn<T>;
  /** Initial contents; triggers a full rebuild. */
  items?: Iterable<T>;
  observer?: HeapObserver;
  /** Run a full invariant check every N completed operations (0 disables). */
  verifySampleRate?: number;
  nanPolicy?: NanPolicy;
  /** Rendered attribute length above which observers get a truncated string. */
  attributeLimit?: number;
  /** Receives swallowed observer failures. */
  logger?: Logger;
}

/**
 * Priority heap contract.
 * `toArray()` returns the tree layout (index 0 = root), always as a copy.
 */
export interface PriorityHeap<T> {
  size(): number;
  isEmpty(): boolean;
  peek(): T | undefined;
  peek<D>(fallback: D): T | D;
  push(value: T): void;
  pop(): T | undefined;
  pop<D>(fallback: D): T | D;
  pushpop(value: T): T;
  replace(value: T): T;
  remove(value: T, options?: { all?: boolean }): number;
  removeAt(index: number): T | undefined;
  extend(items: Iterable<T> | null | undefined): void;
  clear(): void;
  heapify(): void;
  toggleMode(): void;
  setMode(mode: HeapMode): void;
  getMode(): HeapMode;
  nlargest(n: number): T[];
  isValidHeap(): boolean;
  assertValid(): void;
  depth(): number;
  isPerfect(): boolean;
  getStats(): HeapStats;
  toArray(): T[];
}
