import type { HeapObserver } from "../heap.js";
import type { EventAttributes, HeapEvent } from "../types.js";

export type StepKind = "compare" | "swap" | "move" | "appear";

export interface TimelineStep {
  kind: StepKind;
  durationMs: number;
  attributes: EventAttributes;
}

export type StepDurations = Record<StepKind, number>;

export const DEFAULT_STEP_DURATIONS: StepDurations = {
  compare: 120,
  swap: 220,
  move: 220,
  appear: 180,
};

const EVENT_STEPS: Partial<Record<HeapEvent, StepKind>> = {
  compare: "compare",
  swap: "swap",
  move: "move",
  insert: "appear",
};

/**
 * Observer that turns structural events into a queue of timed steps.
 * A front end pulls steps with `next()` at its own pace; events it does not
 * animate are ignored.
 */
export class EventTimeline implements HeapObserver {
  private readonly steps: TimelineStep[] = [];
  private readonly durations: StepDurations;

  constructor(durations: Partial<StepDurations> = {}) {
    this.durations = { ...DEFAULT_STEP_DURATIONS, ...durations };
  }

  onHeapEvent(event: HeapEvent, attributes: EventAttributes): void {
    const kind = EVENT_STEPS[event];
    if (!kind) return;
    this.steps.push({ kind, durationMs: this.durations[kind], attributes });
  }

  pending(): number {
    return this.steps.length;
  }

  next(): TimelineStep | undefined {
    return this.steps.shift();
  }

  totalDurationMs(): number {
    let total = 0;
    for (const s of this.steps) total += s.durationMs;
    return total;
  }

  clear(): void {
    this.steps.length = 0;
  }
}
