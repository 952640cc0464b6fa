import type { FieldError } from "../core/errors.js";

export function isOneOf<T extends string>(v: unknown, options: readonly T[]): v is T {
  return options.some((o) => o === v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

/** Integer from a number or a decimal string (env values are strings). */
export function asInt(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isInteger(v) ? v : undefined;
  if (typeof v === "string" && /^-?\d+$/.test(v.trim())) return Number.parseInt(v, 10);
  return undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
