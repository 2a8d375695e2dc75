import Papa from "papaparse";

export type TabularRow = Record<string, string | number>;

/** CSV with a header row taken from `columns`; cells are quoted only when needed. */
export function toCsv(columns: string[], rows: TabularRow[]): string {
  const data = rows.map((row) => columns.map((column) => row[column] ?? ""));
  const csv = Papa.unparse({ fields: columns, data }, { newline: "\n" });
  return `${csv}\n`;
}

export function formatTimestamp(value: Date): string {
  return value.toISOString().slice(0, 19).replace("T", " ");
}
