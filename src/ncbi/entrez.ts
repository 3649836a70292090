import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { writeBinary } from "../utils/fs";

export const EUTILS_BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

export interface EntrezCredentials {
  email?: string;
  apiKey?: string;
  tool?: string;
}

const ESearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string())
  })
});

const ESummaryResponseSchema = z.object({
  result: z.record(z.unknown())
});

const AssemblySummarySchema = z.object({
  ftppath_genbank: z.string().optional()
});

function entrezParams(credentials: EntrezCredentials, extra: Record<string, string>): URLSearchParams {
  const params = new URLSearchParams(extra);
  params.set("retmode", "json");
  params.set("tool", credentials.tool ?? "genome-amr-pipeline");
  if (credentials.email) params.set("email", credentials.email);
  if (credentials.apiKey) params.set("api_key", credentials.apiKey);
  return params;
}

async function getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const res = await fetch(url);
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Entrez request failed: ${res.status} ${res.statusText} - ${text}`);
  }
  const parsed = schema.safeParse(await res.json());
  if (!parsed.success) {
    throw new Error(`Unexpected Entrez response shape from ${url}`);
  }
  return parsed.data;
}

export async function searchAssemblyUid(
  accession: string,
  credentials: EntrezCredentials = {}
): Promise<string | null> {
  const params = entrezParams(credentials, { db: "assembly", term: accession });
  const json = await getJson(`${EUTILS_BASE_URL}/esearch.fcgi?${params.toString()}`, ESearchResponseSchema);
  return json.esearchresult.idlist[0] ?? null;
}

export async function fetchGenbankFtpPath(
  uid: string,
  credentials: EntrezCredentials = {}
): Promise<string | null> {
  const params = entrezParams(credentials, { db: "assembly", id: uid });
  const json = await getJson(`${EUTILS_BASE_URL}/esummary.fcgi?${params.toString()}`, ESummaryResponseSchema);
  const summary = AssemblySummarySchema.safeParse(json.result[uid]);
  if (!summary.success) return null;
  return summary.data.ftppath_genbank || null;
}

/** `ftp://host/dir/NAME` → `https://host/dir/NAME/NAME_genomic.fna.gz` */
export function genomicFastaUrl(ftpPath: string): string {
  const base = ftpPath.replace(/^ftp:\/\//, "https://").replace(/\/+$/, "");
  const name = base.slice(base.lastIndexOf("/") + 1);
  return `${base}/${name}_genomic.fna.gz`;
}

export interface DownloadedGenome {
  accession: string;
  url: string;
  path: string;
  bytes: number;
}

export async function downloadGenome(
  accession: string,
  outDir: string,
  credentials: EntrezCredentials = {}
): Promise<DownloadedGenome> {
  const uid = await searchAssemblyUid(accession, credentials);
  if (!uid) {
    throw new Error(`No results found for accession ${accession}`);
  }
  const ftpPath = await fetchGenbankFtpPath(uid, credentials);
  if (!ftpPath) {
    throw new Error(`No FTP link found for ${accession}`);
  }

  const url = genomicFastaUrl(ftpPath);
  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`Genome fetch failed (${res.status}) for ${url}`);
  }
  const buffer = Buffer.from(await res.arrayBuffer());
  const filePath = path.join(outDir, `${accession}.fna.gz`);
  await writeBinary(filePath, buffer);
  return { accession, url, path: filePath, bytes: buffer.length };
}

export async function readAccessions(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, "utf8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
