/*
Purpose: turn shell errors into printable lines and provide ANSI styling for CLI output.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  ConfigError,
  OutputError,
  SourceError,
  TemplateError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "detail"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  if (options.useColor === undefined) {
    return isTty;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }

  for (const detail of normalized.details) {
    lines.push({ kind: "detail", text: detail });
  }

  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }

  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });
    lines.push({ kind: "name", text: resolveDebugName(error) });

    const cause = resolveCauseMessage(normalized.cause, normalized.message);
    if (cause) {
      lines.push({ kind: "cause", text: cause });
    }

    const stack = resolveDebugStack(error, normalized.cause);
    if (stack) {
      lines.push({ kind: "stack", text: stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = normalizeOptionalText(error.message);
    return message ?? error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// Shell errors thrown below the CLI map onto a fixed user-facing code per class.
export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof SourceError) {
    return fromPackageError(error, USER_FACING_ERROR_CODES.input, {
      title: "Package source unreadable.",
      hint: `Check that ${error.sourcePath} exists and is valid YAML.`,
    });
  }

  if (error instanceof ConfigError) {
    return fromPackageError(error, USER_FACING_ERROR_CODES.config, {
      title: "Config invalid.",
      hint: "Fix facet-refine.config.yaml or pass --config <path>.",
    });
  }

  if (error instanceof TemplateError) {
    return fromPackageError(error, USER_FACING_ERROR_CODES.template, {
      title: "Artifact templates unavailable.",
      hint: "Ensure templates/b is shipped next to package.json.",
    });
  }

  if (error instanceof OutputError) {
    return fromPackageError(error, USER_FACING_ERROR_CODES.output, {
      title: "Artifacts could not be written.",
      hint: "Check that the output directory is writable.",
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: normalizeOptionalText(formatErrorMessage(error)) ?? DEFAULT_ERROR_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function fromPackageError(
  error: Error,
  code: UserFacingErrorCode,
  copy: Pick<UserFacingErrorInput, "title" | "hint">,
): UserFacingError {
  return new UserFacingError({
    code,
    title: copy.title,
    message: normalizeOptionalText(error.message) ?? DEFAULT_ERROR_MESSAGE,
    hint: copy.hint,
    cause: error,
  });
}

function normalizeOptionalText(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveDebugName(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return typeof error;
}

function resolveCauseMessage(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }

  const resolved = normalizeOptionalText(formatErrorMessage(cause));
  if (!resolved || resolved === message) {
    return undefined;
  }

  return resolved;
}

function resolveDebugStack(error: unknown, cause?: unknown): string | undefined {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }

  if (cause instanceof Error && cause.stack) {
    return cause.stack;
  }

  return undefined;
}
