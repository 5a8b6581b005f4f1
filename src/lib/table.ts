/**
 * Renders left-aligned columns separated by two spaces, with a dashed rule
 * under the header. Trailing padding is stripped from every line.
 */
export function renderTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const widths = headers.map((header, idx) => {
    const cellLengths = rows.map((row) => (row[idx] ?? "").length);
    return Math.max(header.length, ...cellLengths);
  });

  const formatRow = (cells: readonly string[]): string =>
    widths.map((width, idx) => (cells[idx] ?? "").padEnd(width)).join("  ").trimEnd();

  const lines = [formatRow(headers), widths.map((width) => "-".repeat(width)).join("  ")];
  for (const row of rows) {
    lines.push(formatRow(row));
  }
  return lines.join("\n");
}
