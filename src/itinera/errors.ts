import { ZodError } from "zod";

export type ItineraErrorCode =
  | "BAD_REQUEST"
  | "INVALID_CONFIG"
  | "NOT_CONFIGURED"
  | "DECOMPOSITION_FAILED"
  | "INVALID_TRANSITION"
  | "INTERNAL";

export class ItineraError extends Error {
  readonly code: ItineraErrorCode;
  readonly details?: unknown;

  constructor(code: ItineraErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "ItineraError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }

  toJSON(): { code: ItineraErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

/**
 * Raised when a request cannot be turned into a well-formed DecomposedQuery.
 * Fatal for the whole pipeline: nothing is dispatched after it.
 */
export class DecompositionError extends ItineraError {
  constructor(message: string, details?: unknown) {
    super("DECOMPOSITION_FAILED", message, details);
    this.name = "DecompositionError";
  }
}

export function toItineraError(err: unknown): ItineraError {
  if (err instanceof ItineraError) return err;
  if (err instanceof ZodError) {
    return new ItineraError("BAD_REQUEST", "Validation error", { issues: err.issues });
  }
  if (err instanceof Error) {
    return new ItineraError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new ItineraError("INTERNAL", "Unknown error", { err });
}
