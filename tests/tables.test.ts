import { promises as fs } from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { runExtractCommand } from "../src/commands/extract";
import { runMergeCommand } from "../src/commands/merge";
import { extractColumns } from "../src/tables/extract";
import { mergeTables } from "../src/tables/merge";
import { formatTsv, parseTsv } from "../src/tables/tsv";
import { createRecordingLogger } from "./helpers/logger";
import { makeTempDir, removeTempDirs } from "./helpers/tmp";

const fixturesDir = path.join(process.cwd(), "fixtures");

afterEach(removeTempDirs);

describe("tab-delimited tables", () => {
  it("pads short rows and keeps empty cells", () => {
    const table = parseTsv("Isolate\tA\tB\r\nx\t\t1\r\ny\r\n");

    expect(table).toEqual({ header: ["Isolate", "A", "B"], rows: [["x", "", "1"], ["y", "", ""]] });
    expect(formatTsv(table)).toBe("Isolate\tA\tB\nx\t\t1\ny\t\t\n");
  });

  it("keeps quoted cells holding tabs together and quotes them on output", () => {
    const table = parseTsv('Isolate\tPoint mutation\tQuinolone\nC1\t"gyrA\tS83I"\tqnrS1\n');

    expect(table.rows).toEqual([["C1", "gyrA\tS83I", "qnrS1"]]);
    expect(formatTsv(table)).toBe('Isolate\tPoint mutation\tQuinolone\nC1\t"gyrA\tS83I"\tqnrS1\n');
  });

  it("rejects an empty table", () => {
    expect(() => parseTsv("\n")).toThrow("Table is empty");
  });
});

describe("column extraction", () => {
  it("keeps the identifier column and every matching column", () => {
    const table = parseTsv("Isolate\tQuinolone\tTetracycline\tquinolone (partial)\nC1\tgyrA\ttetO\t\n");

    expect(extractColumns(table, "Quinolone")).toEqual({
      header: ["Isolate", "Quinolone", "quinolone (partial)"],
      rows: [["C1", "gyrA", ""]]
    });
  });

  it("fails when no column matches", () => {
    const table = parseTsv("Isolate\tTetracycline\nC1\ttetO\n");

    expect(() => extractColumns(table, "quinolone")).toThrow("No columns containing 'quinolone' found");
  });

  it("extracts quinolone columns from an AMR summary file", async () => {
    const outDir = await makeTempDir();
    const outputPath = path.join(outDir, "quinolone.txt");

    await runExtractCommand(
      {
        inputPath: path.join(fixturesDir, "abritamr_summary.txt"),
        outputPath,
        pattern: "quinolone"
      },
      createRecordingLogger()
    );

    expect(await fs.readFile(outputPath, "utf8")).toBe(
      [
        "Isolate\tQuinolone\tQuinolone resistance (point mutation)",
        "C001\t\tgyrA_T86I",
        "C002\tqnrB19\t",
        "C003\t\tgyrA_T86I",
        ""
      ].join("\n")
    );
  });
});

describe("table merge", () => {
  it("unions columns in first-seen order", () => {
    const merged = mergeTables([
      parseTsv("Isolate\tQuinolone\nA\tgyrA\n"),
      parseTsv("Isolate\tQuinolone (partial)\tQuinolone\nB\tqnrS\t\n")
    ]);

    expect(merged).toEqual({
      header: ["Isolate", "Quinolone", "Quinolone (partial)"],
      rows: [
        ["A", "gyrA", ""],
        ["B", "", "qnrS"]
      ]
    });
  });

  it("merges every .txt table of a directory and skips unreadable ones", async () => {
    const inputDir = await makeTempDir();
    const outDir = await makeTempDir();
    await fs.writeFile(path.join(inputDir, "a.txt"), "Isolate\tQuinolone\nA\tgyrA\n");
    await fs.writeFile(path.join(inputDir, "b.txt"), "Isolate\tQuinolone\nB\t\n");
    await fs.writeFile(path.join(inputDir, "c.txt"), "");
    await fs.writeFile(path.join(inputDir, "ignored.csv"), "Isolate,Quinolone\n");
    const logger = createRecordingLogger();
    const outputPath = path.join(outDir, "merged.txt");

    const result = await runMergeCommand({ inputDir, outputPath }, logger);

    expect(result.failed).toEqual([{ file: path.join(inputDir, "c.txt"), error: "Table is empty" }]);
    expect(await fs.readFile(outputPath, "utf8")).toBe("Isolate\tQuinolone\nA\tgyrA\nB\t\n");
    expect(logger.messages("warn")).toEqual(["Failed to read table"]);
  });

  it("leaves a previous merge output in the same directory out of the merge", async () => {
    const inputDir = await makeTempDir();
    await fs.writeFile(path.join(inputDir, "a.txt"), "Isolate\tQuinolone\nA\tgyrA\n");
    await fs.writeFile(path.join(inputDir, "b.txt"), "Isolate\tQuinolone\nB\tqnrS1\n");
    const outputPath = path.join(inputDir, "merged.txt");

    await runMergeCommand({ inputDir, outputPath }, createRecordingLogger());
    const second = await runMergeCommand({ inputDir, outputPath }, createRecordingLogger());

    expect(second.merged).toEqual([path.join(inputDir, "a.txt"), path.join(inputDir, "b.txt")]);
    expect(await fs.readFile(outputPath, "utf8")).toBe("Isolate\tQuinolone\nA\tgyrA\nB\tqnrS1\n");
  });

  it("fails when the directory holds no tables", async () => {
    const inputDir = await makeTempDir();

    await expect(
      runMergeCommand({ inputDir, outputPath: path.join(inputDir, "merged.tsv") }, createRecordingLogger())
    ).rejects.toThrow(`No .txt files found in directory '${inputDir}'`);
  });
});
