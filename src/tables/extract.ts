import type { Table } from "./tsv";

export const DEFAULT_ID_COLUMN = "Isolate";

/** Keeps `idColumn` plus every column whose name contains `pattern` (case-insensitive). */
export function extractColumns(table: Table, pattern: string, idColumn = DEFAULT_ID_COLUMN): Table {
  const needle = pattern.toLowerCase();
  const matching = table.header.filter(
    (name) => name !== idColumn && name.toLowerCase().includes(needle)
  );
  if (matching.length === 0) {
    throw new Error(`No columns containing '${pattern}' found`);
  }
  const idIndex = table.header.indexOf(idColumn);
  if (idIndex === -1) {
    throw new Error(`Column '${idColumn}' not found`);
  }

  const indexes = [idIndex, ...matching.map((name) => table.header.indexOf(name))];
  return {
    header: indexes.map((index) => table.header[index]),
    rows: table.rows.map((row) => indexes.map((index) => row[index]))
  };
}
