export type {
  EventAttributes,
  HeapEvent,
  HeapKey,
  HeapMode,
  HeapStats,
  KeyFn,
  Logger,
  NanPolicy,
} from "./core/types.js";
export type { HeapObserver, HeapOptions, PriorityHeap } from "./core/heap.js";
export { HeapError, isHeapError, type FieldError, type HeapErrorCode } from "./core/errors.js";
export * from "./core/impl/index.js";
export { loadHeapConfig, DEFAULT_HEAP_CONFIG, type HeapConfig } from "./config/env.js";
export { createHeap } from "./createHeap.js";
