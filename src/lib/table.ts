const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, "").length;
}

function pad(cell: string, width: number): string {
  return cell + " ".repeat(Math.max(0, width - visibleLength(cell)));
}

/** Plain column layout; cells may carry chalk colours. */
export function renderTable(headers: string[], rows: string[][]): string {
  if (rows.length === 0) {
    return "";
  }

  const widths = headers.map((header, idx) => {
    const cellLengths = rows.map((row) => visibleLength(row[idx] ?? ""));
    return Math.max(header.length, ...cellLengths);
  });

  const headerLine = headers.map((header, idx) => pad(header, widths[idx])).join("  ");
  const divider = widths.map((width) => "-".repeat(width)).join("  ");
  const body = rows
    .map((row) => headers.map((_, idx) => pad(row[idx] ?? "", widths[idx])).join("  ").trimEnd())
    .join("\n");

  return `${headerLine.trimEnd()}\n${divider}\n${body}`;
}
