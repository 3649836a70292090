import type { Kingdom, LaunchFailurePolicy } from "../config/runConfig";
import { parseRunConfig } from "../config/runConfig";
import type { PipelineEnv } from "../config/env";
import { runPipeline } from "../pipeline/orchestrator";
import type { PipelineDeps, PipelineOutcome } from "../pipeline/orchestrator";

export interface RunPipelineCommandOptions {
  inputDir: string;
  outputDir: string;
  threads: number;
  kingdom: Kingdom;
  species: string;
  skipAnnotation: boolean;
  onLaunchFailure: LaunchFailurePolicy;
  timeoutMs?: number;
  keepWorkDir: boolean;
}

export async function runRunCommand(
  options: RunPipelineCommandOptions,
  env: PipelineEnv,
  deps: PipelineDeps = {}
): Promise<PipelineOutcome> {
  const config = parseRunConfig({
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    threads: options.threads,
    kingdom: options.kingdom,
    species: options.species,
    annotate: !options.skipAnnotation,
    launchFailurePolicy: options.onLaunchFailure,
    toolTimeoutMs: options.timeoutMs ?? env.AMR_PIPELINE_TOOL_TIMEOUT_MS,
    keepWorkDir: options.keepWorkDir,
    tools: {
      annotation: env.PROKKA_BIN,
      amr: env.ABRITAMR_BIN
    }
  });

  if (deps.signal) {
    return runPipeline(config, deps);
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    return await runPipeline(config, { ...deps, signal: controller.signal });
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
