export type TableColumn = {
  key: string;
  header: string;
  minWidth?: number;
};

const ANSI_RE = /\u001b\[[0-9;]*m/g;

export function visibleWidth(value: string): number {
  return value.replace(ANSI_RE, "").length;
}

function pad(value: string, width: number): string {
  return value + " ".repeat(Math.max(0, width - visibleWidth(value)));
}

/**
 * Left-aligned plain-text table. Cells may carry ANSI colour codes; widths are
 * measured on the visible text. Trailing spaces are trimmed from every line.
 */
export function renderTable(opts: {
  columns: TableColumn[];
  rows: Array<Record<string, string>>;
  gap?: number;
}): string {
  const gap = " ".repeat(opts.gap ?? 2);
  const widths = opts.columns.map((column) =>
    Math.max(
      column.minWidth ?? 0,
      visibleWidth(column.header),
      ...opts.rows.map((row) => visibleWidth(row[column.key] ?? "")),
    ),
  );
  const line = (cells: string[]) =>
    cells
      .map((cell, index) => pad(cell, widths[index] ?? 0))
      .join(gap)
      .trimEnd();

  const lines = [
    line(opts.columns.map((column) => column.header)),
    line(widths.map((width) => "-".repeat(width))),
    ...opts.rows.map((row) => line(opts.columns.map((column) => row[column.key] ?? ""))),
  ];
  return lines.join("\n");
}
