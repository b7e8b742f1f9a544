import { toUserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
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

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// LINES
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const userError = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [
    { kind: "title", text: userError.title },
    { kind: "message", text: userError.message },
  ];

  if (userError.hint) lines.push({ kind: "hint", text: userError.hint });
  if (userError.next) lines.push({ kind: "next", text: userError.next });

  if (options.mode === "short") {
    return lines;
  }

  lines.push({ kind: "code", text: userError.code });
  lines.push({ kind: "name", text: error instanceof Error ? error.name : typeof error });

  // A wrapped taxonomy error is its own cause; report what it wrapped instead.
  const cause = userError.cause === error ? readCause(error) : userError.cause;
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;

  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

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

export function resolveColorEnabled(args: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!args.stream?.isTTY) return false;
  if (args.useColor !== undefined) return args.useColor;
  if (process.env.NO_COLOR !== undefined) return false;
  return true;
}

// =============================================================================
// INTERNALS
// =============================================================================

function readCause(error: unknown): unknown {
  if (error instanceof Error && "cause" in error) {
    return error.cause;
  }
  return undefined;
}
