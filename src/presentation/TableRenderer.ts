/**
 * Plain-text tables for the get-* actions
 */
export function renderTable(title: string, headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length))
  );

  const line = (cells: readonly string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join(" | ")
      .trimEnd();
  const separator = widths.map((width) => "-".repeat(width)).join("-+-");

  return [
    `${title} (${rows.length})`,
    line(headers),
    separator,
    ...rows.map((row) => line(headers.map((_, column) => row[column] ?? ""))),
  ].join("\n");
}
