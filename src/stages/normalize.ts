import { createReadStream, createWriteStream, promises as fs } from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import { createGunzip } from "zlib";
import { failedItem, okItem } from "../pipeline/outcomes";
import type { ItemOutcome } from "../types/runReport";
import { listEntries } from "../utils/fs";
import type { Logger } from "../utils/log";
import { errorMessage } from "../utils/text";

export const COMPRESSED_SUFFIX = ".gz";

export interface NormalizeOptions {
  logger: Logger;
}

export interface NormalizeResult {
  decompressed: string[];
  items: ItemOutcome[];
}

export const PARTIAL_SUFFIX = ".partial";

// `targetPath` is replaced only after the whole archive has been decompressed.
async function gunzipFile(sourcePath: string, targetPath: string): Promise<void> {
  const partialPath = `${targetPath}${PARTIAL_SUFFIX}-${process.pid}`;
  try {
    await pipeline(createReadStream(sourcePath), createGunzip(), createWriteStream(partialPath));
    await fs.rename(partialPath, targetPath);
  } catch (error) {
    await fs.rm(partialPath, { force: true });
    throw error;
  }
}

/**
 * Decompresses every `*.gz` entry of `inputDir` next to itself and removes the archive.
 * Running it again once no archives remain does nothing.
 */
export async function normalizeInputs(
  inputDir: string,
  options: NormalizeOptions
): Promise<NormalizeResult> {
  const { logger } = options;
  const decompressed: string[] = [];
  const items: ItemOutcome[] = [];

  logger.info("Checking for compressed files", { dir: inputDir });
  for (const name of await listEntries(inputDir)) {
    if (!name.endsWith(COMPRESSED_SUFFIX)) continue;

    const sourcePath = path.join(inputDir, name);
    const targetName = name.slice(0, -COMPRESSED_SUFFIX.length);
    const targetPath = path.join(inputDir, targetName);

    try {
      await gunzipFile(sourcePath, targetPath);
      await fs.unlink(sourcePath);
      decompressed.push(targetPath);
      items.push(okItem(name, `decompressed to ${targetName}`));
      logger.info("Decompressed", { file: name, to: targetPath });
    } catch (error) {
      items.push(failedItem(name, "ItemFailure", errorMessage(error)));
      logger.warn("Failed to decompress", { file: name, error: errorMessage(error) });
    }
  }

  logger.info("Decompression completed", { count: decompressed.length });
  return { decompressed, items };
}
