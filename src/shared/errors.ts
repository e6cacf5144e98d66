import type { ZodError } from "zod";

export type SpcErrorCode =
  | "INVALID_CONFIGURATION"
  | "UNSUPPORTED_SUBGROUP_SIZE"
  | "SAMPLE_SIZE_MISMATCH"
  | "EMPTY_SAMPLE"
  | "INVALID_SAMPLE";

/**
 * Error raised by engines, the constants table and the rule engine.
 * Thrown before any state is touched, so a caught SpcError leaves the
 * engine exactly as it was.
 */
export class SpcError extends Error {
  readonly code: SpcErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: SpcErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "SpcError";
    this.code = code;
    this.details = details;
  }
}

export function isSpcError(err: unknown, code?: SpcErrorCode): err is SpcError {
  return err instanceof SpcError && (code === undefined || err.code === code);
}

/** Flatten zod issues into "path: message" strings. */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function fromZodError(code: SpcErrorCode, context: string, error: ZodError): SpcError {
  const issues = formatZodIssues(error);
  return new SpcError(code, `${context}: ${issues.join("; ")}`, { issues });
}
