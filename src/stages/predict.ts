import { promises as fs } from "fs";
import path from "path";
import { failedItem, okItem } from "../pipeline/outcomes";
import { commandSucceeded, formatCommand } from "../process/commandRunner";
import type { CommandRunner, CommandSpec } from "../process/commandRunner";
import type { ItemOutcome } from "../types/runReport";
import { ensureDir, isDirectory, isRegularFile, listEntries, moveFile } from "../utils/fs";
import type { Logger } from "../utils/log";
import { errorMessage } from "../utils/text";
import { readManifest } from "./manifest";

export const AMR_RESULTS_DIR = "abritamr_results";
export const AMR_LOG_FILE_NAME = "abritamr.log";
export const WORK_DIR_PREFIX = ".abritamr-work-";
export const RESULT_FILE_NAMES = [
  "summary_matches.txt",
  "abritamr.txt",
  "summary_partials.txt",
  "summary_virulence.txt"
] as const;

export interface PredictOptions {
  manifestPath: string;
  outputDir: string;
  threads: number;
  species: string;
  runner: CommandRunner;
  logger: Logger;
  bin?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  /**
   * Directory the tool runs in. When omitted a scoped directory is created under
   * `outputDir` and removed afterwards (unless `keepWorkDir`).
   */
  workDir?: string;
  keepWorkDir?: boolean;
}

export interface PredictionResult {
  resultsDir: string;
  workDir: string;
  relocated: string[];
  removedDirs: string[];
  toolSucceeded: boolean;
  items: ItemOutcome[];
}

export function buildAmrCommand(
  manifestPath: string,
  threads: number,
  species: string,
  bin = "abritamr"
): CommandSpec {
  return {
    file: bin,
    args: ["run", "-j", String(threads), "--species", species, "-c", path.resolve(manifestPath)]
  };
}

/** Moves the known result tables from `workDir` into `resultsDir`. */
export async function relocateResults(
  workDir: string,
  resultsDir: string,
  logger: Logger
): Promise<{ relocated: string[]; items: ItemOutcome[] }> {
  const relocated: string[] = [];
  const items: ItemOutcome[] = [];
  await ensureDir(resultsDir);

  for (const name of RESULT_FILE_NAMES) {
    const source = path.join(workDir, name);
    if (!(await isRegularFile(source))) continue;
    const target = path.join(resultsDir, name);
    try {
      await moveFile(source, target);
      relocated.push(target);
      items.push(okItem(name, `moved to ${target}`));
    } catch (error) {
      items.push(failedItem(name, "ItemFailure", `move failed: ${errorMessage(error)}`));
      logger.warn("Failed to move result file", { file: name, error: errorMessage(error) });
    }
  }

  return { relocated, items };
}

/** Removes directories of `workDir` whose name is one of `sampleIds`. */
export async function removeSampleDirectories(
  workDir: string,
  sampleIds: Iterable<string>,
  logger: Logger
): Promise<{ removed: string[]; items: ItemOutcome[] }> {
  const ids = new Set(sampleIds);
  const removed: string[] = [];
  const items: ItemOutcome[] = [];

  for (const name of await listEntries(workDir)) {
    if (!ids.has(name)) continue;
    const dirPath = path.join(workDir, name);
    if (!(await isDirectory(dirPath))) continue;
    try {
      await fs.rm(dirPath, { recursive: true });
      removed.push(dirPath);
      logger.info("Removed sample working directory", { dir: dirPath });
    } catch (error) {
      items.push(failedItem(name, "ItemFailure", `cleanup failed: ${errorMessage(error)}`));
      logger.warn("Failed to remove sample working directory", {
        dir: dirPath,
        error: errorMessage(error)
      });
    }
  }

  return { removed, items };
}

export async function predictResistance(options: PredictOptions): Promise<PredictionResult> {
  const { logger } = options;
  const outputDir = path.resolve(options.outputDir);
  const resultsDir = path.join(outputDir, AMR_RESULTS_DIR);
  const items: ItemOutcome[] = [];

  logger.info("Starting AMR prediction", { manifest: options.manifestPath });
  const entries = await readManifest(options.manifestPath);
  if (entries.length === 0) {
    items.push(failedItem("manifest", "PreconditionFailure", "manifest has no entries"));
    logger.warn("Manifest is empty; the AMR tool is expected to fail", {
      manifest: options.manifestPath
    });
  }

  await ensureDir(outputDir);
  const scoped = options.workDir === undefined;
  const workDir = options.workDir ?? (await fs.mkdtemp(path.join(outputDir, WORK_DIR_PREFIX)));

  try {
    const command = buildAmrCommand(options.manifestPath, options.threads, options.species, options.bin);
    const result = await options.runner(command, {
      logger,
      cwd: workDir,
      logPath: path.join(outputDir, AMR_LOG_FILE_NAME),
      timeoutMs: options.timeoutMs,
      signal: options.signal
    });
    const toolSucceeded = commandSucceeded(result);
    items.push(
      toolSucceeded
        ? okItem("abritamr", formatCommand(command))
        : failedItem("abritamr", "ItemFailure", `AMR tool exited with ${result.exitCode ?? result.signal}`)
    );

    logger.info("Moving AMR results", { to: resultsDir });
    const relocation = await relocateResults(workDir, resultsDir, logger);
    items.push(...relocation.items);

    logger.info("Cleaning up sample working directories", { dir: workDir });
    const cleanup = await removeSampleDirectories(
      workDir,
      entries.map((entry) => entry.sampleId),
      logger
    );
    items.push(...cleanup.items);

    logger.info("AMR prediction completed", { relocated: relocation.relocated.length });
    return {
      resultsDir,
      workDir,
      relocated: relocation.relocated,
      removedDirs: cleanup.removed,
      toolSucceeded,
      items
    };
  } finally {
    if (scoped && !options.keepWorkDir) {
      await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        logger.warn("Failed to remove working directory", { dir: workDir, error: errorMessage(error) });
      });
    }
  }
}
