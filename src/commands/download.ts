import path from "path";
import type { PipelineEnv } from "../config/env";
import { downloadGenome, readAccessions } from "../ncbi/entrez";
import type { DownloadedGenome } from "../ncbi/entrez";
import { ensureDir } from "../utils/fs";
import { createConsoleLogger } from "../utils/log";
import type { Logger } from "../utils/log";
import { errorMessage } from "../utils/text";

export interface DownloadCommandOptions {
  accessionsPath: string;
  outDir: string;
}

export interface DownloadSummary {
  downloaded: DownloadedGenome[];
  failed: { accession: string; error: string }[];
}

export async function runDownloadCommand(
  options: DownloadCommandOptions,
  env: PipelineEnv,
  logger: Logger = createConsoleLogger()
): Promise<DownloadSummary> {
  const outDir = path.resolve(options.outDir);
  await ensureDir(outDir);
  const accessions = await readAccessions(options.accessionsPath);
  const credentials = { email: env.NCBI_EMAIL, apiKey: env.NCBI_API_KEY };

  const summary: DownloadSummary = { downloaded: [], failed: [] };
  for (const accession of accessions) {
    try {
      logger.info("Downloading genome", { accession });
      const genome = await downloadGenome(accession, outDir, credentials);
      summary.downloaded.push(genome);
      logger.info("Downloaded", { accession, path: genome.path, bytes: genome.bytes });
    } catch (error) {
      summary.failed.push({ accession, error: errorMessage(error) });
      logger.warn("Error downloading genome", { accession, error: errorMessage(error) });
    }
  }

  logger.info("Download finished", {
    downloaded: summary.downloaded.length,
    failed: summary.failed.length
  });
  return summary;
}
