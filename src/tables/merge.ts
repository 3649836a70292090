import path from "path";
import { isDirectory, listEntries } from "../utils/fs";
import type { Logger } from "../utils/log";
import { errorMessage } from "../utils/text";
import { readTsv } from "./tsv";
import type { Table } from "./tsv";

export const TABLE_SUFFIX = ".txt";

/** Concatenates tables; the header is the union of columns in first-seen order. */
export function mergeTables(tables: Table[]): Table {
  const header: string[] = [];
  for (const table of tables) {
    for (const name of table.header) {
      if (!header.includes(name)) header.push(name);
    }
  }

  const rows: string[][] = [];
  for (const table of tables) {
    const positions = header.map((name) => table.header.indexOf(name));
    for (const row of table.rows) {
      rows.push(positions.map((index) => (index === -1 ? "" : row[index])));
    }
  }
  return { header, rows };
}

export interface MergeFilesResult {
  table: Table;
  merged: string[];
  failed: { file: string; error: string }[];
}

export interface MergeFilesOptions {
  logger: Logger;
  /** Files left out of the merge, such as the merge's own output when it lives in `inputDir`. */
  exclude?: string[];
}

export async function mergeTableFiles(inputDir: string, options: MergeFilesOptions): Promise<MergeFilesResult> {
  const { logger } = options;
  if (!(await isDirectory(inputDir))) {
    throw new Error(`Directory '${inputDir}' not found`);
  }
  const excluded = new Set((options.exclude ?? []).map((file) => path.resolve(file)));
  const files = (await listEntries(inputDir))
    .filter((name) => name.endsWith(TABLE_SUFFIX))
    .map((name) => path.resolve(inputDir, name))
    .filter((file) => !excluded.has(file));
  if (files.length === 0) {
    throw new Error(`No ${TABLE_SUFFIX} files found in directory '${inputDir}'`);
  }

  const tables: Table[] = [];
  const merged: string[] = [];
  const failed: { file: string; error: string }[] = [];
  for (const file of files) {
    logger.info("Processing table", { file });
    try {
      tables.push(await readTsv(file));
      merged.push(file);
    } catch (error) {
      failed.push({ file, error: errorMessage(error) });
      logger.warn("Failed to read table", { file, error: errorMessage(error) });
    }
  }

  return { table: mergeTables(tables), merged, failed };
}
