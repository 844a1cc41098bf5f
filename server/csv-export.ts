const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvCell(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  const text = typeof value === "string" ? value : String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Header row plus one line per row, newline-terminated.
 */
export function toCsv<T extends object>(rows: readonly T[], columns: readonly (keyof T & string)[]): string {
  const lines = [columns.map(formatCsvCell).join(",")];
  for (const row of rows) {
    lines.push(columns.map(column => formatCsvCell(row[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export interface ExportTable<TReport> {
  filename: string;
  render(report: TReport): string;
}

export function defineExportTable<TReport, TRow extends object>(
  filename: string,
  select: (report: TReport) => readonly TRow[],
  columns: readonly (keyof TRow & string)[],
): ExportTable<TReport> {
  return {
    filename,
    render: report => toCsv(select(report), columns),
  };
}
