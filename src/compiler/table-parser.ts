export type TableRow = Record<string, string>;

/**
 * Parse the body of a Markdown table (without its surrounding fence).
 *
 * The second line is taken to be the separator row and is skipped without
 * being checked. Rows are padded with empty cells or truncated to the header
 * width.
 */
export function parseTable(text: string): TableRow[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length < 2) return [];

  const headers = splitRow(lines[0] ?? "");
  const rows: TableRow[] = [];

  for (const line of lines.slice(2)) {
    const cells = splitRow(line);
    const row: TableRow = {};
    headers.forEach((header, i) => {
      row[header] = cells[i] ?? "";
    });
    rows.push(row);
  }

  return rows;
}

/** Split a table line into trimmed cells, ignoring outer pipes */
function splitRow(line: string): string[] {
  return line
    .replace(/^\|+/, "")
    .replace(/\|+$/, "")
    .split("|")
    .map((cell) => cell.trim());
}
