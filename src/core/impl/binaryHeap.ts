import { isDeepStrictEqual } from "node:util";

import { HeapError, errorMessage } from "../errors.js";
import type { HeapObserver, HeapOptions, PriorityHeap } from "../heap.js";
import type { HeapEvent, HeapKey, HeapMode, HeapStats, KeyFn, NanPolicy } from "../types.js";
import { render, renderBounded } from "./format.js";
import { MutationJournal } from "./journal.js";
import { KeyPolicy, prefersKey } from "./keyPolicy.js";
import { Notifier } from "./notifier.js";

const MESSAGE_VALUE_LIMIT = 80;

type Violation = { parent: number; child: number; side: "left" | "right" };

// primitives compare like ===, except NaN matches NaN; objects structurally
function sameElement(a: unknown, b: unknown): boolean {
  if (typeof a === "object" && a !== null && typeof b === "object" && b !== null) return isDeepStrictEqual(a, b);
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Array-backed binary heap with observable structural events.
 *
 * - index 0 is the root; children of i at 2i+1 / 2i+2
 * - every mutating operation is guarded (no re-entry from observers) and
 *   journaled, so a failure leaves storage exactly as it was
 * - `compare` / `swap` are emitted for every pairwise step of a sift
 */
export class BinaryHeap<T> implements PriorityHeap<T> {
  private data: T[] = [];
  private mode: HeapMode;
  private readonly keys: KeyPolicy<T>;
  private readonly notifier: Notifier;
  private readonly verifySampleRate: number;
  private readonly attributeLimit: number | undefined;

  private mutating = false;
  private ops = 0;
  private journal: MutationJournal<T> | undefined;

  constructor(opts: HeapOptions<T> = {}) {
    this.mode = opts.mode ?? "min";
    this.keys = new KeyPolicy(opts.key, opts.nanPolicy ?? "raise");
    this.verifySampleRate = Math.max(0, Math.trunc(opts.verifySampleRate ?? 0));
    this.attributeLimit = opts.attributeLimit;
    this.notifier = new Notifier({ observer: opts.observer, logger: opts.logger, attributeLimit: opts.attributeLimit });

    if (opts.items !== undefined) {
      this.data = Array.from(opts.items);
      this.heapify();
    }
  }

  static from<T>(items: Iterable<T>, opts: Omit<HeapOptions<T>, "items"> = {}): BinaryHeap<T> {
    return new BinaryHeap<T>({ ...opts, items });
  }

  size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  getMode(): HeapMode {
    return this.mode;
  }

  get keyFn(): KeyFn<T> | undefined {
    return this.keys.keyFn;
  }

  get nanPolicy(): NanPolicy {
    return this.keys.nanPolicy;
  }

  operationCount(): number {
    return this.ops;
  }

  peek(): T | undefined;
  peek<D>(fallback: D): T | D;
  peek<D>(fallback?: D): T | D | undefined {
    return this.data.length ? this.data[0] : fallback;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  setObserver(observer: HeapObserver | undefined): void {
    this.notifier.setObserver(observer);
  }

  /** Same configuration and contents; no observer, fresh operation counter. */
  copy(): BinaryHeap<T> {
    const h = new BinaryHeap<T>({
      mode: this.mode,
      key: this.keys.keyFn,
      nanPolicy: this.keys.nanPolicy,
      verifySampleRate: this.verifySampleRate,
      attributeLimit: this.attributeLimit,
    });
    h.data = Array.from(this.data);
    return h;
  }

  push(value: T): void {
    this.mutate(
      "push",
      () => {
        this.keys.keyOf(value);
        this.insert(value);
      },
      (e) => this.notify("insert_error", { value, error: errorMessage(e) }),
    );
  }

  pop(): T | undefined;
  pop<D>(fallback: D): T | D;
  pop<D>(fallback?: D): T | D | undefined {
    return this.mutate(
      "pop",
      (): T | D | undefined => {
        if (this.data.length === 0) {
          this.notify("pop_empty", { size: 0 });
          return fallback;
        }
        return this.takeRoot();
      },
      (e) => this.notify("pop_error", { error: errorMessage(e) }),
    );
  }

  /** Pops until empty; each step is its own guarded operation. */
  *drain(): Generator<T, void, undefined> {
    while (this.data.length > 0) {
      yield this.mutate(
        "pop",
        () => this.takeRoot(),
        (e) => this.notify("pop_error", { error: errorMessage(e) }),
      );
    }
  }

  clear(): void {
    this.mutate("clear", () => {
      const count = this.data.length;
      if (count > 0) this.truncate();
      this.notify("clear", { count });
    });
  }

  extend(items: Iterable<T> | null | undefined): void {
    const batch = items ? Array.from(items) : [];
    if (batch.length === 0) return;
    if (batch.length === 1) {
      this.push(batch[0]);
      return;
    }
    this.mutate("extend", () => {
      for (const item of batch) this.append(item);
      this.rebuild();
      this.notify("extend", { count: batch.length });
    });
  }

  heapify(): void {
    this.mutate("heapify", () => this.rebuild());
  }

  toggleMode(): void {
    this.mutate("toggle_mode", () => {
      this.changeMode(this.mode === "min" ? "max" : "min");
      this.notify("toggle_mode", { mode: this.mode });
      this.rebuild();
    });
  }

  setMode(mode: HeapMode): void {
    this.mutate("set_mode", () => {
      if (mode === this.mode) return;
      this.changeMode(mode);
      this.notify("set_mode", { mode });
      this.rebuild();
    });
  }

  /** Removes structurally equal elements; returns how many were removed. */
  remove(value: T, options?: { all?: boolean }): number {
    const all = options?.all ?? false;
    return this.mutate("remove", () => {
      let removed = 0;
      let i = 0;
      while (i < this.data.length) {
        if (!sameElement(this.data[i], value)) {
          i++;
          continue;
        }
        // the replacement may have moved up; resume where it landed so it is checked
        i = this.removeIndex(i).resumeAt;
        removed++;
        if (!all) break;
      }
      if (removed) this.notify("remove_value", { value, count: removed });
      return removed;
    });
  }

  removeAt(index: number): T | undefined {
    return this.mutate("remove_at", () => {
      if (!Number.isInteger(index) || index < 0 || index >= this.data.length) return undefined;
      return this.removeIndex(index).value;
    });
  }

  /** push(value) followed by pop(), without growing storage. */
  pushpop(value: T): T {
    return this.mutate("pushpop", () => {
      this.keys.keyOf(value);
      if (this.data.length === 0 || this.prefers(value, this.data[0])) return value;
      return this.replaceRoot(value);
    });
  }

  replace(value: T): T {
    return this.mutate("replace", () => {
      if (this.data.length === 0) {
        throw new HeapError({ code: "EMPTY_HEAP", detail: "replace() on an empty heap; use push()" });
      }
      this.keys.keyOf(value);
      return this.replaceRoot(value);
    });
  }

  merge(other: BinaryHeap<T>): void {
    this.mutate("merge", () => {
      const diffs: string[] = [];
      if (other.mode !== this.mode) diffs.push("mode");
      if (other.keys.keyFn !== this.keys.keyFn) diffs.push("key");
      if (other.keys.nanPolicy !== this.keys.nanPolicy) diffs.push("nanPolicy");
      if (diffs.length) {
        throw new HeapError({ code: "INCOMPATIBLE_HEAPS", detail: `cannot merge heaps with different ${diffs.join(", ")}` });
      }
      if (other.data.length === 0) return;

      const items = other.toArray();
      for (const item of items) this.append(item);
      this.rebuild();
      this.notify("merge", { count: items.length, size: this.data.length });
    });
  }

  /** Up to n elements, most preferred first. */
  nlargest(n: number): T[] {
    if (n <= 0 || this.data.length === 0) return [];
    const keyed: Array<{ value: T; key: HeapKey }> = this.data.map((value) => ({ value, key: this.keys.keyOf(value) }));
    keyed.sort((a, b) => (prefersKey(a.key, b.key, this.mode) ? -1 : prefersKey(b.key, a.key, this.mode) ? 1 : 0));
    return keyed.slice(0, n).map((e) => e.value);
  }

  isValidHeap(): boolean {
    return this.findViolation() === undefined;
  }

  assertValid(): void {
    const v = this.findViolation();
    if (!v) return;
    const a = this.data;
    throw new HeapError({
      code: "INVARIANT_VIOLATION",
      detail:
        `heap invariant broken at parent ${v.parent}, ${v.side} child ${v.child}: ` +
        `${renderBounded(a[v.parent], MESSAGE_VALUE_LIMIT)} vs ${renderBounded(a[v.child], MESSAGE_VALUE_LIMIT)}`,
    });
  }

  depth(): number {
    const n = this.data.length;
    return n === 0 ? 0 : 32 - Math.clz32(n);
  }

  isPerfect(): boolean {
    const n = this.data.length;
    return (n & (n + 1)) === 0;
  }

  getStats(): HeapStats {
    return {
      size: this.data.length,
      depth: this.depth(),
      mode: this.mode,
      isValid: this.isValidHeap(),
      isPerfect: this.isPerfect(),
      operationsCount: this.ops,
    };
  }

  toString(): string {
    return `${this.mode === "min" ? "MinHeap" : "MaxHeap"} ${render(this.data)}`;
  }

  private mutate<R>(op: string, body: () => R, onError?: (e: unknown) => void): R {
    if (this.mutating) {
      throw new HeapError({ code: "REENTRANT_MUTATION", detail: `re-entrant heap mutation in '${op}'` });
    }
    this.mutating = true;
    const journal = new MutationJournal<T>();
    this.journal = journal;
    try {
      return body();
    } catch (e) {
      journal.rollback({
        storage: this.data,
        restoreMode: (mode) => {
          this.mode = mode;
        },
      });
      onError?.(e);
      throw e;
    } finally {
      this.journal = undefined;
      this.mutating = false;
      this.ops++;
      this.maybeVerify();
    }
  }

  private maybeVerify(): void {
    if (this.verifySampleRate && this.ops % this.verifySampleRate === 0) this.assertValid();
  }

  private write(index: number, value: T): void {
    this.journal?.record({ kind: "set", index, previous: this.data[index] });
    this.data[index] = value;
  }

  private append(value: T): void {
    this.data.push(value);
    this.journal?.record({ kind: "append" });
  }

  private removeLast(): T {
    const a = this.data;
    const value = a[a.length - 1];
    a.length -= 1;
    this.journal?.record({ kind: "removeLast", value });
    return value;
  }

  private truncate(): void {
    this.journal?.record({ kind: "truncate", items: Array.from(this.data) });
    this.data.length = 0;
  }

  private changeMode(mode: HeapMode): void {
    this.journal?.record({ kind: "mode", previous: this.mode });
    this.mode = mode;
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    const ai = a[i];
    this.write(i, a[j]);
    this.write(j, ai);
  }

  private notify(event: HeapEvent, attributes: Record<string, unknown>): void {
    this.notifier.emit(event, attributes);
  }

  private prefers(a: T, b: T): boolean {
    return this.keys.prefers(a, b, this.mode);
  }

  private insert(value: T): void {
    this.notify("insert_start", { value });
    this.append(value);
    const index = this.data.length - 1;
    this.notify("insert", { index, value });
    this.siftUp(index);
    this.notify("push_done", { size: this.data.length });
  }

  private takeRoot(): T {
    const size = this.data.length;
    this.notify("pop_start", { size });
    const root = this.data[0];
    const last = this.removeLast();
    this.notify("pop_root", { value: root, size });
    if (this.data.length > 0) {
      this.write(0, last);
      this.notify("move", { src: this.data.length, dst: 0, value: last });
      this.siftDown(0);
    }
    this.notify("pop_done", { value: root, size: this.data.length });
    return root;
  }

  private replaceRoot(value: T): T {
    const previous = this.data[0];
    this.write(0, value);
    this.notify("replace_root", { value, previous });
    this.siftDown(0);
    return previous;
  }

  /**
   * Swap-with-last removal. The element moved in is unconstrained relative to its
   * new position: try up first; if it stayed, sift down.
   */
  private removeIndex(index: number): { value: T; resumeAt: number } {
    const lastIndex = this.data.length - 1;
    const value = this.data[index];
    const last = this.removeLast();
    this.notify("remove_at", { index, value });
    if (index === lastIndex) return { value, resumeAt: index };

    this.write(index, last);
    this.notify("move", { src: lastIndex, dst: index, value: last });
    const landed = this.siftUp(index);
    if (landed === index) this.siftDown(index);
    return { value, resumeAt: landed };
  }

  private rebuild(): void {
    const n = this.data.length;
    for (let i = (n >> 1) - 1; i >= 0; i--) this.siftDown(i);
    this.notify("heapify_done", { size: n });
  }

  private siftUp(index: number): number {
    const a = this.data;
    let i = index;
    while (i > 0) {
      const p = (i - 1) >> 1;
      this.notify("compare", { i, j: p, ai: a[i], aj: a[p] });
      if (!this.prefers(a[i], a[p])) break;
      this.notify("swap", { i, j: p, ai: a[i], aj: a[p] });
      this.swap(i, p);
      i = p;
    }
    return i;
  }

  private siftDown(index: number): number {
    const a = this.data;
    const n = a.length;
    let i = index;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let best = i;

      if (l < n) {
        this.notify("compare", { i: l, j: best, ai: a[l], aj: a[best] });
        if (this.prefers(a[l], a[best])) best = l;
      }
      if (r < n) {
        this.notify("compare", { i: r, j: best, ai: a[r], aj: a[best] });
        if (this.prefers(a[r], a[best])) best = r;
      }
      if (best === i) return i;

      this.notify("swap", { i, j: best, ai: a[i], aj: a[best] });
      this.swap(i, best);
      i = best;
    }
  }

  private findViolation(): Violation | undefined {
    const a = this.data;
    const n = a.length;
    for (let i = 0; i < n >> 1; i++) {
      const l = i * 2 + 1;
      const r = l + 1;
      if (l < n && this.prefers(a[l], a[i])) return { parent: i, child: l, side: "left" };
      if (r < n && this.prefers(a[r], a[i])) return { parent: i, child: r, side: "right" };
    }
    return undefined;
  }
}
