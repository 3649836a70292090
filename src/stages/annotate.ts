import { promises as fs } from "fs";
import path from "path";
import { countFailures, failedItem, okItem } from "../pipeline/outcomes";
import { commandSucceeded, formatCommand } from "../process/commandRunner";
import type { CommandResult, CommandRunner, CommandSpec } from "../process/commandRunner";
import { discoverSamples } from "../samples/discover";
import type { Kingdom } from "../config/runConfig";
import { isPipelineError } from "../errors";
import type { PipelineError } from "../errors";
import type { ItemOutcome } from "../types/runReport";
import type { Sample } from "../types/sample";
import { ensureDir, isDirectory, isRegularFile, listEntries } from "../utils/fs";
import type { Logger } from "../utils/log";
import { errorMessage } from "../utils/text";

export const ANNOTATION_RESULTS_DIR = "prokka_results";
export const ANNOTATED_ASSEMBLY_NAME = "PROKKA.fna";

export interface AnnotateOptions {
  inputDir: string;
  outputDir: string;
  threads: number;
  kingdom: Kingdom;
  runner: CommandRunner;
  logger: Logger;
  bin?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface AnnotationResult {
  samples: Sample[];
  items: ItemOutcome[];
  /** Set when the tool could not be launched or the run was cancelled; later samples were not attempted. */
  interruption?: PipelineError;
}

export function annotationDir(outputDir: string, sampleId: string): string {
  return path.join(outputDir, ANNOTATION_RESULTS_DIR, sampleId);
}

export function annotationLogPath(outputDir: string, sampleId: string): string {
  return path.join(outputDir, `${sampleId}_prokka.log`);
}

export function buildAnnotationCommand(
  sample: Sample,
  outDir: string,
  threads: number,
  kingdom: Kingdom,
  bin = "prokka"
): CommandSpec {
  return {
    file: bin,
    args: [
      "--cpus",
      String(threads),
      "--kingdom",
      kingdom,
      "--outdir",
      outDir,
      "--force",
      "--norrna",
      "--notrna",
      sample.path
    ]
  };
}

/** Prefixes every artifact in `dir` with `<sampleId>_`, leaving already prefixed names alone. */
export async function prefixArtifacts(dir: string, sampleId: string): Promise<string[]> {
  const prefix = `${sampleId}_`;
  const renamed: string[] = [];
  for (const name of await listEntries(dir)) {
    if (name.startsWith(prefix)) continue;
    const target = `${prefix}${name}`;
    await fs.rename(path.join(dir, name), path.join(dir, target));
    renamed.push(target);
  }
  return renamed;
}

export async function annotateSamples(options: AnnotateOptions): Promise<AnnotationResult> {
  const { logger, runner } = options;
  const { samples } = await discoverSamples(options.inputDir);
  await ensureDir(path.join(options.outputDir, ANNOTATION_RESULTS_DIR));

  logger.info("Starting genome annotation", { samples: samples.length });
  const annotated: Sample[] = [];
  const items: ItemOutcome[] = [];

  for (const [index, sample] of samples.entries()) {
    const outDir = annotationDir(options.outputDir, sample.id);
    const command = buildAnnotationCommand(
      sample,
      outDir,
      options.threads,
      options.kingdom,
      options.bin
    );

    logger.info("Annotating", { sample: sample.id });
    let result: CommandResult;
    try {
      result = await runner(command, {
        logger,
        logPath: annotationLogPath(options.outputDir, sample.id),
        timeoutMs: options.timeoutMs,
        signal: options.signal
      });
    } catch (error) {
      if (!isPipelineError(error) || (error.kind !== "LaunchFailure" && error.kind !== "Cancelled")) {
        throw error;
      }
      // The orchestrator applies the launch-failure policy to `interruption`.
      items.push(failedItem(sample.id, error.kind, error.message));
      annotated.push(...samples.slice(index));
      logger.info("Genome annotation interrupted", { sample: sample.id, kind: error.kind });
      return { samples: annotated, items, interruption: error };
    }

    if (!commandSucceeded(result)) {
      items.push(
        failedItem(sample.id, "ItemFailure", `annotation exited with ${result.exitCode ?? result.signal}`)
      );
      annotated.push(sample);
      continue;
    }

    if (!(await isDirectory(outDir))) {
      items.push(failedItem(sample.id, "ItemFailure", `no output directory at ${outDir}`));
      annotated.push(sample);
      continue;
    }

    try {
      await prefixArtifacts(outDir, sample.id);
    } catch (error) {
      items.push(failedItem(sample.id, "ItemFailure", `rename failed: ${errorMessage(error)}`));
      logger.warn("Failed to rename annotation artifacts", {
        sample: sample.id,
        error: errorMessage(error)
      });
      annotated.push({ ...sample, annotationDir: outDir });
      continue;
    }

    const assembly = path.join(outDir, `${sample.id}_${ANNOTATED_ASSEMBLY_NAME}`);
    annotated.push({
      ...sample,
      annotationDir: outDir,
      annotatedAssembly: (await isRegularFile(assembly)) ? assembly : undefined
    });
    items.push(okItem(sample.id, formatCommand(command)));
  }

  logger.info("Genome annotation completed", {
    samples: samples.length,
    failed: countFailures(items)
  });
  return { samples: annotated, items };
}
