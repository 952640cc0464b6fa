import { inspect } from "node:util";

export const ELLIPSIS = "…";

/** Single-line rendering of any value; strings are returned as-is. */
export function render(value: unknown): string {
  if (typeof value === "string") return value;
  return inspect(value, { depth: 3, breakLength: Infinity, compact: true });
}

export function truncate(text: string, limit: number): string {
  return text.length > limit ? text.slice(0, limit) + ELLIPSIS : text;
}

export function renderBounded(value: unknown, limit: number): string {
  return truncate(render(value), limit);
}
