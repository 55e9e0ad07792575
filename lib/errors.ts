export type FetchErrorKind = "transient" | "permanent";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status: number | null;
  /** Seconds from a numeric Retry-After header, when the server sent one. */
  readonly retryAfterSeconds: number | null;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    opts?: { status?: number; retryAfterSeconds?: number | null; cause?: unknown }
  ) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.status = opts?.status ?? null;
    this.retryAfterSeconds = opts?.retryAfterSeconds ?? null;
  }
}

export type ExtractionErrorKind = "no_candidates" | "low_confidence";

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;

  constructor(kind: ExtractionErrorKind, message: string) {
    super(message);
    this.name = "ExtractionError";
    this.kind = kind;
  }
}

export type ValidationErrorKind = "invariant_violation" | "missing_required" | "invalid_value";

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string) {
    super(message);
    this.name = "ValidationError";
    this.kind = kind;
  }
}

export class ReconciliationError extends Error {
  readonly kind = "store_unavailable" as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "ReconciliationError";
  }
}

export type RunAbortReason = "cancelled" | "entry_fetch_failed";

export class RunAbortedError extends Error {
  readonly reason: RunAbortReason;

  constructor(reason: RunAbortReason, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "RunAbortedError";
    this.reason = reason;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
