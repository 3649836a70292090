import type { PipelineErrorKind } from "../errors";

export type ItemStatus = "ok" | "failed" | "skipped";

export interface ItemOutcome {
  item: string;
  status: ItemStatus;
  kind: PipelineErrorKind | null;
  message: string | null;
}

export type StageId = "normalize" | "annotate" | "manifest" | "predict";

export type StageStatus = "completed" | "skipped" | "failed" | "not_run";

export interface StageError {
  kind: PipelineErrorKind | "Unexpected";
  message: string;
  command: string | null;
}

export interface StageReport {
  stage: StageId;
  status: StageStatus;
  started_at: string | null;
  ended_at: string | null;
  duration_ms: number;
  items: ItemOutcome[];
  error: StageError | null;
}

export type RunStatus = "completed" | "completed_with_warnings" | "failed";

export interface RunReportConfig {
  input_dir: string;
  output_dir: string;
  threads: number;
  kingdom: string;
  species: string;
  annotate: boolean;
  launch_failure_policy: "abort" | "continue";
  tool_timeout_ms: number | null;
}

export interface RunReportSample {
  sample_id: string;
  path: string;
  annotation_dir: string | null;
}

export interface RunReport {
  schema_version: "1.0";
  started_at: string;
  ended_at: string;
  elapsed_ms: number;
  status: RunStatus;
  config: RunReportConfig;
  manifest_path: string | null;
  results_dir: string | null;
  samples: RunReportSample[];
  stages: StageReport[];
}
