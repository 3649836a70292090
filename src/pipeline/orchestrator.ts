import type { RunConfig } from "../config/runConfig";
import { isKnownSpecies } from "../config/species";
import { EXIT_CODES, exitCodeForKind, PipelineError } from "../errors";
import { buildRunReport, writeRunReport } from "../io/runReport";
import { runCommand } from "../process/commandRunner";
import type { CommandRunner } from "../process/commandRunner";
import { annotateSamples } from "../stages/annotate";
import { buildManifest } from "../stages/manifest";
import { normalizeInputs } from "../stages/normalize";
import { predictResistance } from "../stages/predict";
import type { ItemOutcome, RunReport, RunStatus, StageError, StageId, StageReport } from "../types/runReport";
import type { Sample } from "../types/sample";
import { ensureDir } from "../utils/fs";
import { createConsoleLogger } from "../utils/log";
import type { Logger } from "../utils/log";
import { formatDuration, nowUtcIsoSeconds } from "../utils/time";
import { errorMessage } from "../utils/text";
import { countFailures } from "./outcomes";

export const STAGE_ORDER: readonly StageId[] = ["normalize", "annotate", "manifest", "predict"];

export interface PipelineDeps {
  runner?: CommandRunner;
  logger?: Logger;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface PipelineOutcome {
  report: RunReport;
  reportPath: string;
  exitCode: number;
}

type StageRun<T> = { ok: true; value: T } | { ok: false; error: StageError; partial?: T };

interface StageValue {
  items: ItemOutcome[];
  interruption?: PipelineError;
}

function notRun(stage: StageId): StageReport {
  return {
    stage,
    status: "not_run",
    started_at: null,
    ended_at: null,
    duration_ms: 0,
    items: [],
    error: null
  };
}

function toStageError(error: unknown): StageError {
  if (error instanceof PipelineError) {
    return { kind: error.kind, message: error.message, command: error.command ?? null };
  }
  return { kind: "Unexpected", message: errorMessage(error), command: null };
}

function exitCodeForError(error: StageError): number {
  return error.kind === "Unexpected" ? EXIT_CODES.unexpected : exitCodeForKind(error.kind);
}

/**
 * Runs Normalize → [Annotate] → Build Manifest → Predict in order. Per-item failures are
 * collected in the report; a launch failure stops the run only under the `abort` policy.
 * Nothing is rolled back when a stage fails.
 */
export async function runPipeline(config: RunConfig, deps: PipelineDeps = {}): Promise<PipelineOutcome> {
  const runner = deps.runner ?? runCommand;
  const logger = deps.logger ?? createConsoleLogger();
  const now = deps.now ?? (() => new Date());
  const { signal } = deps;

  const start = now();
  const stages = new Map<StageId, StageReport>(STAGE_ORDER.map((stage) => [stage, notRun(stage)]));
  let samples: Sample[] = [];
  let manifestPath: string | null = null;
  let resultsDir: string | null = null;
  let fatal: StageError | null = null;

  logger.info("Pipeline started");
  logger.info("Input directory", { dir: config.inputDir });
  logger.info("Output directory", { dir: config.outputDir });
  logger.info("Settings", {
    threads: config.threads,
    kingdom: config.kingdom,
    species: config.species,
    annotate: config.annotate
  });
  if (!isKnownSpecies(config.species)) {
    logger.warn("Species is not in the known list; passing it to the AMR tool as given", {
      species: config.species
    });
  }

  async function execute<T extends StageValue>(
    stage: StageId,
    work: () => Promise<T>
  ): Promise<StageRun<T>> {
    const startedAt = now();
    const finish = (items: ItemOutcome[], error: StageError | null): void => {
      const endedAt = now();
      stages.set(stage, {
        stage,
        status: error ? "failed" : "completed",
        started_at: nowUtcIsoSeconds(startedAt),
        ended_at: nowUtcIsoSeconds(endedAt),
        duration_ms: endedAt.getTime() - startedAt.getTime(),
        items,
        error
      });
    };

    try {
      if (signal?.aborted) {
        throw new PipelineError("Cancelled", `Pipeline cancelled before ${stage}`);
      }
      const value = await work();
      if (value.interruption) {
        const stageError = toStageError(value.interruption);
        finish(value.items, stageError);
        logger.error("Stage failed", { stage, kind: stageError.kind, error: stageError.message });
        return { ok: false, error: stageError, partial: value };
      }
      finish(value.items, null);
      return { ok: true, value };
    } catch (error) {
      const stageError = toStageError(error);
      finish([], stageError);
      logger.error("Stage failed", { stage, kind: stageError.kind, error: stageError.message });
      return { ok: false, error: stageError };
    }
  }

  // Decides whether a failed stage ends the run.
  function isFatal(error: StageError): boolean {
    return !(error.kind === "LaunchFailure" && config.launchFailurePolicy === "continue");
  }

  await ensureDir(config.outputDir);

  const normalized = await execute("normalize", () => normalizeInputs(config.inputDir, { logger }));
  if (!normalized.ok) fatal = normalized.error;

  if (!fatal) {
    if (config.annotate) {
      const annotated = await execute("annotate", () =>
        annotateSamples({
          inputDir: config.inputDir,
          outputDir: config.outputDir,
          threads: config.threads,
          kingdom: config.kingdom,
          runner,
          logger,
          bin: config.tools.annotation,
          timeoutMs: config.toolTimeoutMs,
          signal
        })
      );
      const annotatedSamples = annotated.ok ? annotated.value.samples : annotated.partial?.samples;
      if (annotatedSamples) samples = annotatedSamples;
      if (!annotated.ok && isFatal(annotated.error)) {
        fatal = annotated.error;
      } else if (!annotated.ok) {
        logger.warn("Annotation tool could not be launched; continuing", {
          error: annotated.error.message
        });
      }
    } else {
      stages.set("annotate", { ...notRun("annotate"), status: "skipped" });
      logger.info("Annotation skipped");
    }
  }

  if (!fatal) {
    const manifest = await execute("manifest", () =>
      buildManifest(config.inputDir, config.outputDir, { logger })
    );
    if (manifest.ok) {
      manifestPath = manifest.value.manifestPath;
      if (samples.length === 0) samples = manifest.value.samples;
    } else {
      fatal = manifest.error;
    }
  }

  if (!fatal && manifestPath) {
    const sheet = manifestPath;
    const predicted = await execute("predict", () =>
      predictResistance({
        manifestPath: sheet,
        outputDir: config.outputDir,
        threads: config.threads,
        species: config.species,
        runner,
        logger,
        bin: config.tools.amr,
        timeoutMs: config.toolTimeoutMs,
        signal,
        keepWorkDir: config.keepWorkDir
      })
    );
    if (predicted.ok) {
      resultsDir = predicted.value.resultsDir;
    } else if (isFatal(predicted.error)) {
      fatal = predicted.error;
    } else {
      logger.warn("AMR tool could not be launched; continuing", { error: predicted.error.message });
    }
  }

  const stageReports = STAGE_ORDER.map((stage) => stages.get(stage) ?? notRun(stage));
  const hasWarnings = stageReports.some(
    (stage) => stage.status === "failed" || countFailures(stage.items) > 0
  );
  const status: RunStatus = fatal ? "failed" : hasWarnings ? "completed_with_warnings" : "completed";

  const end = now();
  const elapsedMs = end.getTime() - start.getTime();
  const report = buildRunReport({
    config,
    startedAt: nowUtcIsoSeconds(start),
    endedAt: nowUtcIsoSeconds(end),
    elapsedMs,
    status,
    manifestPath,
    resultsDir,
    samples,
    stages: stageReports
  });
  const reportPath = await writeRunReport(report);

  if (fatal) {
    logger.error("Pipeline failed", { kind: fatal.kind, elapsed: formatDuration(elapsedMs) });
  } else {
    logger.info(`Pipeline completed in ${formatDuration(elapsedMs)}`, { status, report: reportPath });
  }

  return { report, reportPath, exitCode: fatal ? exitCodeForError(fatal) : EXIT_CODES.ok };
}
