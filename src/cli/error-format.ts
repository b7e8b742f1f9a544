/*
Purpose: print a failed procedure or pipe run on stderr.
Assumptions: color only on a TTY; --debug adds code, name, cause and stack.
Usage: console.error(renderCliError(err, { debug: debugRequested(argv) ?? false }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = { label: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LINE_STYLES: Record<Exclude<ErrorFormatLineKind, "message" | "stack">, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return formatErrorLines(error, { mode: options.debug ? "debug" : "short" })
    .map((line) => renderLine(line, format))
    .join("\n");
}

/**
 * Reads --debug / --no-debug straight from argv so errors thrown while commander
 * is still parsing are rendered with the right detail. Last flag wins; `--` ends the scan.
 */
export function debugRequested(argv: string[]): boolean | undefined {
  const separator = argv.indexOf("--");
  const flags = (separator === -1 ? argv : argv.slice(0, separator)).filter(
    (arg) => arg === "--debug" || arg === "--no-debug",
  );
  const last = flags.at(-1);
  return last === undefined ? undefined : last === "--debug";
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "message") return line.text;

  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((stackLine) => `  ${stackLine}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const style = LINE_STYLES[line.kind];
  return `${format(style.label, style.labelStyles)} ${format(line.text, style.textStyles)}`;
}
