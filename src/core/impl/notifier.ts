import type { HeapObserver } from "../heap.js";
import type { EventAttributes, HeapEvent, Logger } from "../types.js";
import { render, truncate } from "./format.js";

export const DEFAULT_ATTRIBUTE_LIMIT = 200;

export interface NotifierOptions {
  observer?: HeapObserver;
  logger?: Logger;
  attributeLimit?: number;
}

/**
 * Copies attributes, replacing any value whose rendering is longer than `limit`
 * by the truncated rendering.
 */
export function compactAttributes(attributes: Record<string, unknown>, limit: number): EventAttributes {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(attributes)) {
    const text = render(v);
    out[k] = text.length > limit ? truncate(text, limit) : v;
  }
  return Object.freeze(out);
}

export class Notifier {
  private observer: HeapObserver | undefined;
  private readonly logger: Logger | undefined;
  private readonly limit: number;

  constructor(opts: NotifierOptions = {}) {
    this.observer = opts.observer;
    this.logger = opts.logger;
    this.limit = Math.max(1, Math.trunc(opts.attributeLimit ?? DEFAULT_ATTRIBUTE_LIMIT));
  }

  setObserver(observer: HeapObserver | undefined): void {
    this.observer = observer;
  }

  emit(event: HeapEvent, attributes: Record<string, unknown>): void {
    const observer = this.observer;
    if (!observer) return;
    const snapshot = compactAttributes(attributes, this.limit);
    try {
      observer.onHeapEvent(event, snapshot);
    } catch (e) {
      // observer failures never reach the heap operation
      this.logger?.warn(`heap observer failed on '${event}'`, e);
    }
  }
}
