/**
 * Error kinds and the result envelope every pipeline operation returns.
 */

export type Result<T, E extends Error = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export interface ValidationReport {
  valid: boolean;
  errors: string[];
}

export function report(errors: string[]): ValidationReport {
  return { valid: errors.length === 0, errors };
}

/** Malformed container syntax. */
export class ParseError extends Error {
  readonly kind = "parse" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
  }
}

/** Structurally parsed but schema-invalid input. Carries every violated rule. */
export class ValidationError extends Error {
  readonly kind = "validation" as const;
  readonly errors: string[];

  constructor(context: string, errors: string[]) {
    super(`${context}: ${errors.join(", ")}`);
    this.name = "ValidationError";
    this.errors = [...errors];
  }
}

/** The raw source tree failed its own dialect's validator before conversion. */
export class SourceValidationError extends ValidationError {
  constructor(errors: string[]) {
    super("Invalid source data", errors);
    this.name = "SourceValidationError";
  }
}

/** Unregistered dialect or container name, or an identity conversion. */
export class UnsupportedFormatError extends Error {
  readonly kind = "unsupported_format" as const;
  readonly format: string;

  constructor(format: string, message: string) {
    super(message);
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}

/** Raised only at the file-reading boundary. */
export class IOError extends Error {
  readonly kind = "io" as const;
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IOError";
    this.path = path;
  }
}

export type PipelineError = ParseError | ValidationError | UnsupportedFormatError;

/** A filesystem error for a path that does not exist. */
export function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
