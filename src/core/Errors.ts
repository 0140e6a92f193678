import type { SummaryError } from "../types/result.js";

export function err(
  code: SummaryError["code"],
  message: string,
  details?: unknown,
  field?: string,
): SummaryError {
  return { code, message, details, field };
}

/** Thrown by the engine; SummaryBuilder turns it back into a SummaryResult. */
export class SummaryFailure extends Error {
  readonly error: SummaryError;

  constructor(error: SummaryError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = "SummaryFailure";
    this.error = error;
  }
}

export function fail(
  code: SummaryError["code"],
  message: string,
  details?: unknown,
  field?: string,
): never {
  throw new SummaryFailure(err(code, message, details, field));
}

export function toSummaryError(
  e: unknown,
  fallback: SummaryError["code"],
): SummaryError {
  if (e instanceof SummaryFailure) return e.error;
  return err(fallback, e instanceof Error ? e.message : String(e), {
    cause: e,
  });
}
