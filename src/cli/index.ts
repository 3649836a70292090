#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError, Option } from "commander";
import pkg from "../../package.json";
import { loadEnv } from "../config/env";
import { KINGDOMS } from "../config/runConfig";
import { KNOWN_SPECIES } from "../config/species";
import { runDownloadCommand } from "../commands/download";
import { runExtractCommand } from "../commands/extract";
import { runManifestCommand } from "../commands/manifest";
import { runMergeCommand } from "../commands/merge";
import { runRunCommand } from "../commands/run";
import { EXIT_CODES, isPipelineError, exitCodeForKind } from "../errors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.AMR_PIPELINE_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("amr-pipeline")
  .description("Genome annotation and AMR prediction pipeline")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides AMR_PIPELINE_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("run")
  .description("Decompress inputs, annotate genomes, build the manifest and predict AMR")
  .requiredOption("-i, --input-dir <dir>", "Directory containing genome files in .fna or .fna.gz format")
  .requiredOption("-o, --output-dir <dir>", "Directory where output files will be saved")
  .option("-t, --threads <n>", "Number of threads to use", parsePositiveInt, 4)
  .addOption(
    new Option("-k, --kingdom <kingdom>", "Kingdom for annotation").choices(KINGDOMS).default("Bacteria")
  )
  .requiredOption(
    "-s, --species <species>",
    `Species for AMR prediction (e.g. ${KNOWN_SPECIES.join(", ")})`
  )
  .option("--skip-annotation", "Skip the annotation stage", false)
  .addOption(
    new Option("--on-launch-failure <policy>", "What to do when a tool cannot be launched")
      .choices(["abort", "continue"])
      .default("abort")
  )
  .option("--timeout <ms>", "Timeout for each external tool invocation", parsePositiveInt)
  .option("--keep-work-dir", "Keep the AMR tool's scoped working directory", false)
  .action(async (opts) => {
    const outcome = await runRunCommand(
      {
        inputDir: opts.inputDir,
        outputDir: opts.outputDir,
        threads: opts.threads,
        kingdom: opts.kingdom,
        species: opts.species,
        skipAnnotation: opts.skipAnnotation,
        onLaunchFailure: opts.onLaunchFailure,
        timeoutMs: opts.timeout,
        keepWorkDir: opts.keepWorkDir
      },
      loadEnv()
    );
    process.exitCode = outcome.exitCode;
  });

program
  .command("manifest")
  .description("Write the sample manifest for a directory of .fna files")
  .requiredOption("-i, --input-dir <dir>", "Directory containing .fna files")
  .requiredOption("-o, --output-dir <dir>", "Directory to write sample_sheet.txt into")
  .action(async (opts) => {
    await runManifestCommand({ inputDir: opts.inputDir, outputDir: opts.outputDir });
  });

program
  .command("download")
  .description("Download genome assemblies from NCBI by accession")
  .requiredOption("-i, --accessions <file>", "File with one assembly accession per line")
  .requiredOption("-o, --out <dir>", "Directory to save the downloaded genome files")
  .action(async (opts) => {
    const summary = await runDownloadCommand(
      { accessionsPath: opts.accessions, outDir: opts.out },
      loadEnv()
    );
    if (summary.failed.length > 0) process.exitCode = 1;
  });

program
  .command("extract")
  .description("Extract columns matching a pattern from an AMR result table")
  .requiredOption("-i, --input <file>", "Tab-delimited AMR result table")
  .requiredOption("-o, --output <file>", "Output file for the extracted columns")
  .option("-p, --pattern <text>", "Case-insensitive column name pattern", "quinolone")
  .option("--id-column <name>", "Identifier column kept in the output", "Isolate")
  .action(async (opts) => {
    await runExtractCommand({
      inputPath: opts.input,
      outputPath: opts.output,
      pattern: opts.pattern,
      idColumn: opts.idColumn
    });
  });

program
  .command("merge")
  .description("Merge all .txt tables of a directory into one table")
  .requiredOption("-i, --input <dir>", "Directory containing result tables")
  .requiredOption("-o, --output <file>", "Output file for the merged table")
  .action(async (opts) => {
    await runMergeCommand({ inputDir: opts.input, outputPath: opts.output });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = isPipelineError(error) ? exitCodeForKind(error.kind) : EXIT_CODES.unexpected;
});
