import { promises as fs } from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { PipelineError } from "../src/errors";
import { formatManifest } from "../src/stages/manifest";
import { buildAmrCommand, predictResistance, removeSampleDirectories } from "../src/stages/predict";
import { createFakeRunner } from "./helpers/fakeRunner";
import type { FakeBehavior } from "./helpers/fakeRunner";
import { createRecordingLogger } from "./helpers/logger";
import { listDir, makeTempDir, removeTempDirs } from "./helpers/tmp";

afterEach(removeTempDirs);

async function writeManifest(dir: string, ids: string[]): Promise<string> {
  const filePath = path.join(dir, "sample_sheet.txt");
  await fs.writeFile(
    filePath,
    formatManifest(ids.map((id) => ({ sampleId: id, path: path.join(dir, `${id}.fna`) })))
  );
  return filePath;
}

// Mimics the AMR tool: result tables and per-sample folders in its working directory.
const amrTool: FakeBehavior = async (_command, options) => {
  const cwd = options.cwd ?? process.cwd();
  await fs.writeFile(path.join(cwd, "summary_matches.txt"), "Isolate\tQuinolone\nA\tgyrA\n");
  await fs.writeFile(path.join(cwd, "summary_partials.txt"), "Isolate\n");
  for (const id of ["A", "B"]) {
    await fs.mkdir(path.join(cwd, id, "nested"), { recursive: true });
    await fs.writeFile(path.join(cwd, id, "nested", "hits.tab"), "x");
  }
  await fs.mkdir(path.join(cwd, "unrelated"));
  return { stdout: "done" };
};

describe("AMR command", () => {
  it("passes parallelism, species and the absolute manifest path", () => {
    expect(buildAmrCommand("/out/sample_sheet.txt", 6, "Salmonella")).toEqual({
      file: "abritamr",
      args: ["run", "-j", "6", "--species", "Salmonella", "-c", "/out/sample_sheet.txt"]
    });
  });
});

describe("AMR stage", () => {
  it("moves result tables and removes the scoped working directory", async () => {
    const outputDir = await makeTempDir();
    const manifestPath = await writeManifest(outputDir, ["A", "B"]);
    const runner = createFakeRunner(amrTool);

    const result = await predictResistance({
      manifestPath,
      outputDir,
      threads: 4,
      species: "Campylobacter",
      runner,
      logger: createRecordingLogger()
    });

    const resultsDir = path.join(outputDir, "abritamr_results");
    expect(result.resultsDir).toBe(resultsDir);
    expect(await listDir(resultsDir)).toEqual(["summary_matches.txt", "summary_partials.txt"]);
    expect(await fs.readFile(path.join(resultsDir, "summary_matches.txt"), "utf8")).toBe(
      "Isolate\tQuinolone\nA\tgyrA\n"
    );
    expect(runner.calls[0].options.cwd).toBe(result.workDir);
    expect(path.dirname(result.workDir)).toBe(outputDir);
    expect(path.basename(result.workDir).startsWith(".abritamr-work-")).toBe(true);
    expect(runner.calls[0].options.logPath).toBe(path.join(outputDir, "abritamr.log"));
    expect(result.removedDirs).toEqual([path.join(result.workDir, "A"), path.join(result.workDir, "B")]);
    expect(await listDir(outputDir)).toEqual(["abritamr_results", "sample_sheet.txt"]);
    expect(result.toolSucceeded).toBe(true);
  });

  it("leaves no sample-named directory in a caller-provided working directory", async () => {
    const outputDir = await makeTempDir();
    const workDir = await makeTempDir();
    const manifestPath = await writeManifest(outputDir, ["A", "B"]);

    await predictResistance({
      manifestPath,
      outputDir,
      threads: 1,
      species: "Escherichia",
      runner: createFakeRunner(amrTool),
      logger: createRecordingLogger(),
      workDir
    });

    expect(await listDir(workDir)).toEqual(["unrelated"]);
  });

  it("keeps the scoped working directory when asked to", async () => {
    const outputDir = await makeTempDir();
    const manifestPath = await writeManifest(outputDir, ["A", "B"]);

    const result = await predictResistance({
      manifestPath,
      outputDir,
      threads: 1,
      species: "Escherichia",
      runner: createFakeRunner(amrTool),
      logger: createRecordingLogger(),
      keepWorkDir: true
    });

    expect(await listDir(result.workDir)).toEqual(["unrelated"]);
  });

  it("records an empty manifest and a failing tool without throwing", async () => {
    const outputDir = await makeTempDir();
    const manifestPath = await writeManifest(outputDir, []);
    const runner = createFakeRunner(() => ({ exitCode: 1, stderr: "no samples" }));

    const result = await predictResistance({
      manifestPath,
      outputDir,
      threads: 1,
      species: "Campylobacter",
      runner,
      logger: createRecordingLogger()
    });

    expect(result.toolSucceeded).toBe(false);
    expect(result.relocated).toEqual([]);
    expect(result.items).toEqual([
      { item: "manifest", status: "failed", kind: "PreconditionFailure", message: "manifest has no entries" },
      { item: "abritamr", status: "failed", kind: "ItemFailure", message: "AMR tool exited with 1" }
    ]);
  });

  it("removes the scoped working directory when the tool cannot be launched", async () => {
    const outputDir = await makeTempDir();
    const manifestPath = await writeManifest(outputDir, ["A"]);
    const runner = createFakeRunner(() => {
      throw new PipelineError("LaunchFailure", "Could not launch abritamr: spawn abritamr ENOENT");
    });

    await expect(
      predictResistance({
        manifestPath,
        outputDir,
        threads: 1,
        species: "Campylobacter",
        runner,
        logger: createRecordingLogger()
      })
    ).rejects.toMatchObject({ kind: "LaunchFailure" });
    expect(await listDir(outputDir)).toEqual(["sample_sheet.txt"]);
  });
});

describe("sample directory cleanup", () => {
  it("only removes directories whose name is a sample identifier", async () => {
    const dir = await makeTempDir();
    await fs.mkdir(path.join(dir, "A"));
    await fs.mkdir(path.join(dir, "Ab"));
    await fs.writeFile(path.join(dir, "B"), "a file, not a directory");

    const cleanup = await removeSampleDirectories(dir, ["A", "B"], createRecordingLogger());

    expect(cleanup.removed).toEqual([path.join(dir, "A")]);
    expect(cleanup.items).toEqual([]);
    expect(await listDir(dir)).toEqual(["Ab", "B"]);
  });
});
