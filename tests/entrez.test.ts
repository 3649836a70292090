import { promises as fs } from "fs";
import path from "path";
import { gzipSync } from "zlib";
import { afterEach, describe, expect, it, vi } from "vitest";
import { runDownloadCommand } from "../src/commands/download";
import { downloadGenome, genomicFastaUrl } from "../src/ncbi/entrez";
import { createRecordingLogger } from "./helpers/logger";
import { makeTempDir, removeTempDirs } from "./helpers/tmp";

const FTP_PATH = "ftp://ftp.ncbi.nlm.nih.gov/genomes/all/GCA/000/009/085/GCA_000009085.1_ASM908v1";

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" }
  });
}

function fakeEntrez(genome: Buffer) {
  return vi.fn(async (input: string | URL | Request) => {
    const url = new URL(String(input));
    if (url.pathname.endsWith("esearch.fcgi")) {
      const found = url.searchParams.get("term") === "GCA_000009085.1";
      return jsonResponse({ esearchresult: { idlist: found ? ["30828"] : [] } });
    }
    if (url.pathname.endsWith("esummary.fcgi")) {
      return jsonResponse({ result: { uids: ["30828"], "30828": { ftppath_genbank: FTP_PATH } } });
    }
    return new Response(new Uint8Array(genome), { status: 200 });
  });
}

afterEach(async () => {
  vi.unstubAllGlobals();
  await removeTempDirs();
});

describe("NCBI genome download", () => {
  it("builds the genomic FASTA URL over https", () => {
    expect(genomicFastaUrl(`${FTP_PATH}/`)).toBe(
      "https://ftp.ncbi.nlm.nih.gov/genomes/all/GCA/000/009/085/GCA_000009085.1_ASM908v1/GCA_000009085.1_ASM908v1_genomic.fna.gz"
    );
  });

  it("resolves the accession and saves the compressed assembly", async () => {
    const genome = gzipSync(">chr\nACGT\n");
    const fetchMock = fakeEntrez(genome);
    vi.stubGlobal("fetch", fetchMock);
    const outDir = await makeTempDir();

    const result = await downloadGenome("GCA_000009085.1", outDir, { email: "lab@example.org" });

    expect(result.path).toBe(path.join(outDir, "GCA_000009085.1.fna.gz"));
    expect(result.bytes).toBe(genome.length);
    expect(await fs.readFile(result.path)).toEqual(genome);
    const searchUrl = new URL(String(fetchMock.mock.calls[0][0]));
    expect(searchUrl.searchParams.get("db")).toBe("assembly");
    expect(searchUrl.searchParams.get("retmode")).toBe("json");
    expect(searchUrl.searchParams.get("email")).toBe("lab@example.org");
    expect(searchUrl.searchParams.has("api_key")).toBe(false);
    expect(String(fetchMock.mock.calls[2][0])).toBe(genomicFastaUrl(FTP_PATH));
  });

  it("downloads every accession and reports the ones that fail", async () => {
    vi.stubGlobal("fetch", fakeEntrez(gzipSync(">chr\nA\n")));
    const workDir = await makeTempDir();
    const accessionsPath = path.join(workDir, "accessions.txt");
    await fs.writeFile(accessionsPath, "GCA_000009085.1\n\n  GCA_999999999.9  \n");
    const logger = createRecordingLogger();

    const summary = await runDownloadCommand(
      { accessionsPath, outDir: path.join(workDir, "genomes") },
      { NCBI_API_KEY: "test-key" },
      logger
    );

    expect(summary.downloaded.map((genome) => genome.accession)).toEqual(["GCA_000009085.1"]);
    expect(summary.failed).toEqual([
      { accession: "GCA_999999999.9", error: "No results found for accession GCA_999999999.9" }
    ]);
    expect(logger.messages("warn")).toEqual(["Error downloading genome"]);
  });

  it("surfaces HTTP errors from E-utilities", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("busy", { status: 429, statusText: "Too Many Requests" }))
    );

    await expect(downloadGenome("GCA_000009085.1", await makeTempDir())).rejects.toThrow(
      "Entrez request failed: 429 Too Many Requests - busy"
    );
  });
});
