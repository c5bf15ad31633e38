import { ZodError } from "zod";

/**
 * Error codes for structural failures that stop a run before rendering.
 * Per-entry problems are Diagnostics, never thrown.
 */
export type ErrorCode = "CONFIG_INVALID" | "BIB_SYNTAX" | "AUX_INVALID" | "LOOKUP_FAILED" | "INTERNAL";

/**
 * Structured error report (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

abstract class BibgateError extends Error {
  abstract readonly code: ErrorCode;

  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

/**
 * YAML policy file could not be read, parsed or validated.
 */
export class PolicyConfigError extends BibgateError {
  readonly code = "CONFIG_INVALID" as const;

  constructor(
    readonly file: string | undefined,
    message: string,
    readonly issues: string[] = []
  ) {
    super(file ? `${file}: ${message}` : message);
    this.name = "PolicyConfigError";
  }

  override details(): Record<string, unknown> | undefined {
    return this.issues.length > 0 ? { file: this.file, issues: this.issues } : undefined;
  }
}

/**
 * BibTeX source could not be tokenized.
 */
export class BibSyntaxError extends BibgateError {
  readonly code = "BIB_SYNTAX" as const;

  constructor(
    readonly file: string | undefined,
    readonly line: number,
    message: string
  ) {
    super(`${file ?? "<input>"}:${line}: ${message}`);
    this.name = "BibSyntaxError";
  }

  override details(): Record<string, unknown> {
    return { file: this.file ?? null, line: this.line };
  }
}

/**
 * LaTeX aux file is missing or malformed.
 */
export class AuxFileError extends BibgateError {
  readonly code = "AUX_INVALID" as const;

  constructor(
    readonly file: string,
    message: string
  ) {
    super(`${file}: ${message}`);
    this.name = "AuxFileError";
  }
}

/**
 * A single journal abbreviation request failed. Never escapes the
 * normalizer: it degrades to a warning there.
 */
export class JournalLookupError extends BibgateError {
  readonly code = "LOOKUP_FAILED" as const;

  constructor(
    readonly journal: string,
    message: string,
    readonly statusCode?: number
  ) {
    super(message);
    this.name = "JournalLookupError";
  }

  override details(): Record<string, unknown> {
    return this.statusCode === undefined
      ? { journal: this.journal }
      : { journal: this.journal, status_code: this.statusCode };
  }
}

/**
 * Build a structured error report
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  return error;
}

/**
 * Convert Zod validation issues to readable "path: message" strings
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Convert any thrown value to ErrorV1
 */
export function toErrorV1(error: unknown): ErrorV1 {
  if (error instanceof BibgateError) {
    return buildErrorV1(error.code, error.message, error.details());
  }

  if (error instanceof ZodError) {
    return buildErrorV1("CONFIG_INVALID", "Validation failed", { issues: formatZodIssues(error) });
  }

  if (error instanceof Error) {
    return buildErrorV1("INTERNAL", error.message || "An unexpected error occurred");
  }

  return buildErrorV1("INTERNAL", String(error));
}
