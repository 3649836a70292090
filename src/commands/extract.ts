import path from "path";
import { DEFAULT_ID_COLUMN, extractColumns } from "../tables/extract";
import { readTsv, writeTsv } from "../tables/tsv";
import type { Table } from "../tables/tsv";
import { createConsoleLogger } from "../utils/log";
import type { Logger } from "../utils/log";

export interface ExtractCommandOptions {
  inputPath: string;
  outputPath: string;
  pattern: string;
  idColumn?: string;
}

export async function runExtractCommand(
  options: ExtractCommandOptions,
  logger: Logger = createConsoleLogger()
): Promise<Table> {
  const inputPath = path.resolve(options.inputPath);
  logger.info("Loading table", { file: inputPath });
  const table = await readTsv(inputPath);
  const extracted = extractColumns(table, options.pattern, options.idColumn ?? DEFAULT_ID_COLUMN);

  const outputPath = path.resolve(options.outputPath);
  await writeTsv(outputPath, extracted);
  logger.info("Extraction complete", {
    file: outputPath,
    columns: extracted.header.length,
    rows: extracted.rows.length
  });
  return extracted;
}
