/*
Purpose: turn unknown thrown values into labelled lines for CLI output and log warnings.
Assumptions: RebuildError carries the message users see; everything else falls back to String().
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import { RebuildError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "hint" | "name" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [{ kind: "title", text: formatErrorMessage(error) }];

  if (error instanceof RebuildError && error.hint) {
    lines.push({ kind: "hint", text: error.hint });
  }

  if (options.mode !== "debug" || !(error instanceof Error)) {
    return lines;
  }

  lines.push({ kind: "name", text: error.name });

  if (error.cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
  }
  if (error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  dim: [2, 22],
  bold: [1, 22],
};

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
}): boolean {
  if (!input.stream.isTTY) return false;

  const env = input.env ?? process.env;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;

  return input.useColor ?? true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}
