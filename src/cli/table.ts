// Plain-text table for terminal summaries: two spaces between columns, no borders.

export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, index) =>
    columnWidth(
      rows.map((row) => row[index] ?? ""),
      header,
    ),
  );

  const renderRow = (cells: string[]): string =>
    widths
      .map((width, index) => pad(cells[index] ?? "", width))
      .join("  ")
      .trimEnd();

  return [renderRow(headers), ...rows.map(renderRow)].join("\n");
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}
