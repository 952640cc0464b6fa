import { HeapError, errorMessage } from "../errors.js";
import type { HeapKey, HeapMode, KeyFn, NanPolicy } from "../types.js";
import { renderBounded } from "./format.js";

const DESCRIBE_LIMIT = 80;

export function isHeapKey(v: unknown): v is HeapKey {
  return typeof v === "number" || typeof v === "bigint" || typeof v === "string";
}

export function normalizeKey(raw: HeapKey, policy: NanPolicy): HeapKey {
  if (typeof raw !== "number" || !Number.isNaN(raw)) return raw;
  switch (policy) {
    case "raise":
      throw new HeapError({ code: "INVALID_VALUE", detail: "NaN key is not allowed (nanPolicy 'raise')" });
    case "min":
      return -Infinity;
    case "max":
      return Infinity;
  }
}

/**
 * True iff `a` sits strictly above `b` under `mode`.
 * Strings only compare with strings; numbers and bigints compare freely.
 */
export function prefersKey(a: HeapKey, b: HeapKey, mode: HeapMode): boolean {
  if ((typeof a === "string") !== (typeof b === "string")) {
    throw new HeapError({
      code: "INVALID_VALUE",
      detail: `keys of type ${typeof a} and ${typeof b} are not comparable`,
    });
  }
  return mode === "min" ? a < b : a > b;
}

/**
 * Key projection + NaN normalization for one heap configuration.
 * Every structural comparison goes through `prefers`.
 */
export class KeyPolicy<T> {
  constructor(
    readonly keyFn: KeyFn<T> | undefined,
    readonly nanPolicy: NanPolicy,
  ) {}

  keyOf(value: T): HeapKey {
    let raw: unknown = value;
    if (this.keyFn) {
      try {
        raw = this.keyFn(value);
      } catch (e) {
        throw new HeapError({
          code: "INVALID_VALUE",
          detail: `key function failed for ${renderBounded(value, DESCRIBE_LIMIT)}: ${errorMessage(e)}`,
          cause: e,
        });
      }
    }
    if (!isHeapKey(raw)) {
      throw new HeapError({
        code: "INVALID_VALUE",
        detail: `key for ${renderBounded(value, DESCRIBE_LIMIT)} must be a number, bigint or string`,
      });
    }
    return normalizeKey(raw, this.nanPolicy);
  }

  prefers(a: T, b: T, mode: HeapMode): boolean {
    return prefersKey(this.keyOf(a), this.keyOf(b), mode);
  }
}
