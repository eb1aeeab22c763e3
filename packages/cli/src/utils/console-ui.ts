export type TableRow = Record<string, string | null>;

/**
 * Render rows as an aligned text table. Columns default to every key seen in
 * the rows, in first-seen order.
 */
export function formatTable<T extends TableRow, K extends keyof T & string>(
  data: T[],
  columns: K[] | null = null,
): string[] {
  if (data.length === 0) {
    return ["(none)"];
  }

  const headers: string[] = columns ?? [...new Set(data.flatMap(Object.keys))];
  const cell = (row: T, header: string) => String(row[header] ?? "");

  const widths = headers.map((header) =>
    Math.max(header.length, ...data.map((row) => cell(row, header).length)),
  );

  const line = (values: string[]) =>
    values
      .map((value, index) => value.padEnd(widths[index] ?? 0))
      .join(" | ")
      .trimEnd();

  return [
    line(headers),
    widths.map((width) => "-".repeat(width)).join("-|-"),
    ...data.map((row) => line(headers.map((header) => cell(row, header)))),
  ];
}

export function printTable<T extends TableRow, K extends keyof T & string>(
  data: T[],
  columns: K[] | null = null,
): void {
  for (const row of formatTable(data, columns)) {
    console.log(row);
  }
}
