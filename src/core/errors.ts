/*
Purpose: error types for the shell around the pure core (source loading, config, templates, output).
Assumptions: the core never throws for invalid package data; these classes mark I/O and setup failures.
Usage: throw new SourceError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class PackageError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "PackageError";
  }
}

export class ConfigError extends PackageError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SourceError extends PackageError {
  constructor(
    message: string,
    public readonly sourcePath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "SourceError";
  }
}

export class TemplateError extends PackageError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TemplateError";
  }
}

export class OutputError extends PackageError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "OutputError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  template: "TEMPLATE_ERROR",
  output: "OUTPUT_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  details?: string[];
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly details: string[];
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.details = input.details ?? [];
    this.cause = input.cause;
  }
}
