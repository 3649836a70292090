import path from "path";
import { buildManifest } from "../stages/manifest";
import type { ManifestResult } from "../stages/manifest";
import { createConsoleLogger } from "../utils/log";
import type { Logger } from "../utils/log";

export interface ManifestCommandOptions {
  inputDir: string;
  outputDir: string;
}

export async function runManifestCommand(
  options: ManifestCommandOptions,
  logger: Logger = createConsoleLogger()
): Promise<ManifestResult> {
  return buildManifest(path.resolve(options.inputDir), path.resolve(options.outputDir), { logger });
}
