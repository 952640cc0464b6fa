export type HeapErrorCode =
  | "INVALID_VALUE"
  | "REENTRANT_MUTATION"
  | "EMPTY_HEAP"
  | "INCOMPATIBLE_HEAPS"
  | "INVARIANT_VIOLATION"
  | "INVALID_CONFIG";

export interface FieldError {
  path: string;
  message: string;
}

export interface HeapErrorParams {
  code: HeapErrorCode;
  detail: string;
  cause?: unknown;
  errors?: FieldError[];
}

export class HeapError extends Error {
  readonly code: HeapErrorCode;
  readonly title: string;
  readonly errors?: FieldError[];

  constructor(params: HeapErrorParams) {
    super(params.detail, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "HeapError";
    this.code = params.code;
    this.title = codeToTitle(params.code);
    this.errors = params.errors;
  }
}

export function isHeapError(e: unknown, code?: HeapErrorCode): e is HeapError {
  return e instanceof HeapError && (code === undefined || e.code === code);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function codeToTitle(code: HeapErrorCode): string {
  switch (code) {
    case "INVALID_VALUE":
      return "Invalid value";
    case "REENTRANT_MUTATION":
      return "Re-entrant mutation";
    case "EMPTY_HEAP":
      return "Empty heap";
    case "INCOMPATIBLE_HEAPS":
      return "Incompatible heaps";
    case "INVARIANT_VIOLATION":
      return "Invariant violation";
    case "INVALID_CONFIG":
      return "Invalid configuration";
  }
}
