import { promises as fs } from "fs";
import Papa from "papaparse";
import { writeText } from "../utils/fs";

export interface Table {
  header: string[];
  rows: string[][];
}

const DELIMITER = "\t";

/** Parses a tab-delimited table whose first line is the header. Short rows are padded. */
export function parseTsv(content: string): Table {
  const result = Papa.parse<string[]>(content, { delimiter: DELIMITER, skipEmptyLines: true });
  if (result.errors.length > 0) {
    throw new Error(
      `Table parsing errors: ${result.errors.map((e) => `row ${e.row ?? "?"}: ${e.message}`).join(", ")}`
    );
  }
  const [header, ...rest] = result.data;
  if (!header) {
    throw new Error("Table is empty");
  }
  const rows = rest.map((cells) => {
    const padded = [...cells];
    while (padded.length < header.length) padded.push("");
    return padded.slice(0, header.length);
  });
  return { header, rows };
}

export function formatTsv(table: Table): string {
  return Papa.unparse([table.header, ...table.rows], { delimiter: DELIMITER, newline: "\n" }) + "\n";
}

export async function readTsv(filePath: string): Promise<Table> {
  return parseTsv(await fs.readFile(filePath, "utf8"));
}

export async function writeTsv(filePath: string, table: Table): Promise<void> {
  await writeText(filePath, formatTsv(table));
}
