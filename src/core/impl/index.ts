export { BinaryHeap } from "./binaryHeap.js";
export { KeyPolicy, isHeapKey, normalizeKey, prefersKey } from "./keyPolicy.js";
export { Notifier, compactAttributes, DEFAULT_ATTRIBUTE_LIMIT, type NotifierOptions } from "./notifier.js";
export { MutationJournal, type JournalTarget, type UndoEntry } from "./journal.js";
export {
  EventTimeline,
  DEFAULT_STEP_DURATIONS,
  type StepDurations,
  type StepKind,
  type TimelineStep,
} from "./eventTimeline.js";
export { ELLIPSIS, render, renderBounded, truncate } from "./format.js";
