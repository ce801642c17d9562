/*
 * CLI output helpers: diagnostics listings, JSON reports, error lines and exit codes.
 * Assumptions: stdout carries results only; errors go to stderr with optional ANSI styling.
 */

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  toUserFacingError,
  type AnsiStyle,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, type UserFacingErrorCode } from "../core/errors.js";
import type { PackageCompileResult } from "../pipeline/compile.js";
import { formatDiagnostic, type Diagnostic } from "../validation/diagnostics.js";

// =============================================================================
// TYPES
// =============================================================================

export const EXIT_CODES = {
  ok: 0,
  unsafe: 1,
  malformed: 2,
  failure: 3,
} as const;

export type CommandReport = {
  command: "validate" | "emit";
  status: "ok" | "unsafe";
  packages: PackageCompileResult[];
  workspace: Diagnostic[];
  written: string[];
};

export type OutputOptions = {
  json: boolean;
  debug: boolean;
};

// =============================================================================
// REPORTS
// =============================================================================

export function printReport(report: CommandReport, output: OutputOptions): void {
  if (output.json) {
    console.log(JSON.stringify(toJsonReport(report), null, 2));
  } else {
    for (const line of formatReportLines(report)) {
      console.log(line);
    }
  }

  process.exitCode = report.status === "ok" ? EXIT_CODES.ok : EXIT_CODES.unsafe;
}

export function formatReportLines(report: CommandReport): string[] {
  const lines: string[] = [];

  for (const pkg of report.packages) {
    if (pkg.status === "ok") {
      lines.push(`${pkg.packageId}: structurally safe at ${pkg.totalized.current}`);
      continue;
    }
    lines.push(`${pkg.packageId}: ${pkg.diagnostics.length} diagnostic(s)`);
    lines.push(...pkg.diagnostics.map((diagnostic) => `  ${formatDiagnostic(diagnostic)}`));
  }

  if (report.workspace.length > 0) {
    lines.push(`workspace: ${report.workspace.length} diagnostic(s)`);
    lines.push(...report.workspace.map((diagnostic) => `  ${formatDiagnostic(diagnostic)}`));
  }

  if (report.status === "unsafe" && report.command === "emit") {
    lines.push("No artifacts written.");
  }

  lines.push(...report.written.map((filePath) => `Wrote ${filePath}`));
  return lines;
}

function toJsonReport(report: CommandReport): Record<string, unknown> {
  return {
    command: report.command,
    status: report.status,
    packages: report.packages.map((pkg) =>
      pkg.status === "ok"
        ? { package: pkg.packageId, status: pkg.status, current: pkg.totalized.current }
        : { package: pkg.packageId, status: pkg.status, diagnostics: pkg.diagnostics },
    ),
    workspace: report.workspace,
    written: report.written,
  };
}

// =============================================================================
// ERRORS
// =============================================================================

const LINE_STYLES: Partial<Record<ErrorFormatLineKind, AnsiStyle[]>> = {
  title: ["bold", "red"],
  detail: ["yellow"],
  hint: ["cyan"],
  next: ["cyan"],
  code: ["dim"],
  name: ["dim"],
  stack: ["dim"],
};

export function printError(error: unknown, output: OutputOptions): void {
  const userError = toUserFacingError(error);
  process.exitCode = exitCodeFor(userError.code);

  if (output.json) {
    console.log(
      JSON.stringify(
        {
          status: "error",
          code: userError.code,
          title: userError.title,
          message: userError.message,
          details: userError.details,
        },
        null,
        2,
      ),
    );
    return;
  }

  const style = createAnsiFormatter(resolveColorEnabled());
  for (const line of formatErrorLines(userError, { mode: output.debug ? "debug" : "short" })) {
    const prefix = line.kind === "detail" ? "  - " : line.kind === "hint" ? "Hint: " : "";
    console.error(style(`${prefix}${line.text}`, LINE_STYLES[line.kind]));
  }
}

export function exitCodeFor(code: UserFacingErrorCode): number {
  if (code === USER_FACING_ERROR_CODES.input || code === USER_FACING_ERROR_CODES.config) {
    return EXIT_CODES.malformed;
  }
  return EXIT_CODES.failure;
}
