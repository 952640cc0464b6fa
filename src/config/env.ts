import { HeapError, type FieldError } from "../core/errors.js";
import type { HeapMode, NanPolicy } from "../core/types.js";
import { DEFAULT_ATTRIBUTE_LIMIT } from "../core/impl/notifier.js";
import { asInt, asString, isOneOf, pushErr } from "./validation.js";

const MODES: readonly HeapMode[] = ["min", "max"];
const NAN_POLICIES: readonly NanPolicy[] = ["raise", "min", "max"];

export interface HeapConfig {
  mode: HeapMode;
  nanPolicy: NanPolicy;
  verifySampleRate: number;
  attributeLimit: number;
  logObserverErrors: boolean;
}

export const DEFAULT_HEAP_CONFIG: Readonly<HeapConfig> = {
  mode: "min",
  nanPolicy: "raise",
  verifySampleRate: 0,
  attributeLimit: DEFAULT_ATTRIBUTE_LIMIT,
  logObserverErrors: false,
};

/**
 * Reads heap defaults from the environment:
 * HEAP_MODE, HEAP_NAN_POLICY, HEAP_VERIFY_SAMPLE_RATE, HEAP_ATTRIBUTE_LIMIT, HEAP_LOG_OBSERVER_ERRORS.
 *
 * Unset or empty variables fall back to DEFAULT_HEAP_CONFIG. All problems are reported at once.
 */
export function loadHeapConfig(env: NodeJS.ProcessEnv = process.env): HeapConfig {
  const errors: FieldError[] = [];
  const config: HeapConfig = { ...DEFAULT_HEAP_CONFIG };

  const mode = asString(env.HEAP_MODE);
  if (mode !== undefined) {
    if (isOneOf(mode, MODES)) config.mode = mode;
    else pushErr(errors, "HEAP_MODE", `must be one of: ${MODES.join(", ")}`);
  }

  const nanPolicy = asString(env.HEAP_NAN_POLICY);
  if (nanPolicy !== undefined) {
    if (isOneOf(nanPolicy, NAN_POLICIES)) config.nanPolicy = nanPolicy;
    else pushErr(errors, "HEAP_NAN_POLICY", `must be one of: ${NAN_POLICIES.join(", ")}`);
  }

  if (asString(env.HEAP_VERIFY_SAMPLE_RATE) !== undefined) {
    const rate = asInt(env.HEAP_VERIFY_SAMPLE_RATE);
    if (rate === undefined || rate < 0) pushErr(errors, "HEAP_VERIFY_SAMPLE_RATE", "must be an integer >= 0");
    else config.verifySampleRate = rate;
  }

  if (asString(env.HEAP_ATTRIBUTE_LIMIT) !== undefined) {
    const limit = asInt(env.HEAP_ATTRIBUTE_LIMIT);
    if (limit === undefined || limit < 1) pushErr(errors, "HEAP_ATTRIBUTE_LIMIT", "must be an integer >= 1");
    else config.attributeLimit = limit;
  }

  config.logObserverErrors = env.HEAP_LOG_OBSERVER_ERRORS === "1";

  if (errors.length) {
    throw new HeapError({ code: "INVALID_CONFIG", detail: "invalid heap configuration", errors });
  }
  return config;
}
