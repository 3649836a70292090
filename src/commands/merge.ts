import path from "path";
import { mergeTableFiles } from "../tables/merge";
import type { MergeFilesResult } from "../tables/merge";
import { writeTsv } from "../tables/tsv";
import { createConsoleLogger } from "../utils/log";
import type { Logger } from "../utils/log";

export interface MergeCommandOptions {
  inputDir: string;
  outputPath: string;
}

export async function runMergeCommand(
  options: MergeCommandOptions,
  logger: Logger = createConsoleLogger()
): Promise<MergeFilesResult> {
  const outputPath = path.resolve(options.outputPath);
  const result = await mergeTableFiles(path.resolve(options.inputDir), { logger, exclude: [outputPath] });
  await writeTsv(outputPath, result.table);
  logger.info("Merge complete", { file: outputPath, rows: result.table.rows.length });
  return result;
}
