import { promises as fs } from "fs";
import path from "path";
import { okItem, skippedItem } from "../pipeline/outcomes";
import { discoverSamples } from "../samples/discover";
import type { ItemOutcome } from "../types/runReport";
import type { ManifestEntry, Sample } from "../types/sample";
import { writeText } from "../utils/fs";
import type { Logger } from "../utils/log";

export const MANIFEST_FILE_NAME = "sample_sheet.txt";

export interface ManifestOptions {
  logger: Logger;
}

export interface ManifestResult {
  manifestPath: string;
  entries: ManifestEntry[];
  samples: Sample[];
  items: ItemOutcome[];
}

export function manifestPath(outputDir: string): string {
  return path.join(outputDir, MANIFEST_FILE_NAME);
}

export function formatManifest(entries: ManifestEntry[]): string {
  return entries.map((entry) => `${entry.sampleId}\t${entry.path}\n`).join("");
}

export function parseManifest(content: string, source = "manifest"): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  const lines = content.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (!line.trim()) return;
    const fields = line.split("\t");
    if (fields.length !== 2 || !fields[0] || !fields[1]) {
      throw new Error(`${source}:${index + 1} expected "<sample_id>\\t<path>", got ${JSON.stringify(line)}`);
    }
    entries.push({ sampleId: fields[0], path: fields[1] });
  });
  return entries;
}

export async function readManifest(filePath: string): Promise<ManifestEntry[]> {
  const content = await fs.readFile(filePath, "utf8");
  return parseManifest(content, filePath);
}

/**
 * Writes `<outputDir>/sample_sheet.txt` with one line per `.fna` file of `inputDir`.
 * An input directory without sequence files yields an empty manifest and a warning.
 */
export async function buildManifest(
  inputDir: string,
  outputDir: string,
  options: ManifestOptions
): Promise<ManifestResult> {
  const { logger } = options;
  logger.info("Creating sample manifest", { input: inputDir });

  const { samples, skipped } = await discoverSamples(inputDir);
  const items: ItemOutcome[] = [];
  for (const entry of skipped) {
    logger.warn("Skipping entry", { file: entry.name, reason: entry.reason });
    items.push(skippedItem(entry.name, entry.reason));
  }

  const entries = samples.map((sample) => ({ sampleId: sample.id, path: sample.path }));
  for (const sample of samples) {
    items.push(okItem(sample.id, sample.path));
  }

  const filePath = manifestPath(path.resolve(outputDir));
  await writeText(filePath, formatManifest(entries));

  if (entries.length === 0) {
    logger.warn("No valid entries found; manifest is empty", { manifest: filePath });
  } else {
    logger.info("Manifest created", { manifest: filePath, entries: entries.length });
  }

  return { manifestPath: filePath, entries, samples, items };
}
