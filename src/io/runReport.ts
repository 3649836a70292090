import type { RunConfig } from "../config/runConfig";
import type { RunReport, RunReportConfig, RunReportSample, RunStatus, StageReport } from "../types/runReport";
import type { Sample } from "../types/sample";
import { writeJson } from "../utils/fs";
import { assertValidSchema, getRunReportValidator } from "../validation/jsonSchema";
import { runReportPath } from "./paths";

export interface RunReportParams {
  config: RunConfig;
  startedAt: string;
  endedAt: string;
  elapsedMs: number;
  status: RunStatus;
  manifestPath: string | null;
  resultsDir: string | null;
  samples: Sample[];
  stages: StageReport[];
}

function reportConfig(config: RunConfig): RunReportConfig {
  return {
    input_dir: config.inputDir,
    output_dir: config.outputDir,
    threads: config.threads,
    kingdom: config.kingdom,
    species: config.species,
    annotate: config.annotate,
    launch_failure_policy: config.launchFailurePolicy,
    tool_timeout_ms: config.toolTimeoutMs ?? null
  };
}

function reportSample(sample: Sample): RunReportSample {
  return {
    sample_id: sample.id,
    path: sample.path,
    annotation_dir: sample.annotationDir ?? null
  };
}

export function buildRunReport(params: RunReportParams): RunReport {
  return {
    schema_version: "1.0",
    started_at: params.startedAt,
    ended_at: params.endedAt,
    elapsed_ms: params.elapsedMs,
    status: params.status,
    config: reportConfig(params.config),
    manifest_path: params.manifestPath,
    results_dir: params.resultsDir,
    samples: params.samples.map(reportSample),
    stages: params.stages
  };
}

export async function writeRunReport(report: RunReport): Promise<string> {
  assertValidSchema(getRunReportValidator(), report, "Run report");
  const filePath = runReportPath(report.config.output_dir);
  await writeJson(filePath, report);
  return filePath;
}
