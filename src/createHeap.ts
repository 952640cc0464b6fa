import { loadHeapConfig } from "./config/env.js";
import type { HeapOptions } from "./core/heap.js";
import { BinaryHeap } from "./core/impl/binaryHeap.js";

/**
 * Builds a heap whose defaults come from the environment (see `loadHeapConfig`).
 * Explicit options always win over the environment.
 */
export function createHeap<T>(options: HeapOptions<T> = {}, env: NodeJS.ProcessEnv = process.env): BinaryHeap<T> {
  const config = loadHeapConfig(env);
  return new BinaryHeap<T>({
    ...options,
    mode: options.mode ?? config.mode,
    nanPolicy: options.nanPolicy ?? config.nanPolicy,
    verifySampleRate: options.verifySampleRate ?? config.verifySampleRate,
    attributeLimit: options.attributeLimit ?? config.attributeLimit,
    logger: options.logger ?? (config.logObserverErrors ? console : undefined),
  });
}
