import path from "path";
import { PipelineError } from "../errors";
import { isRegularFile, listEntries } from "../utils/fs";
import type { Sample } from "../types/sample";

export const SEQUENCE_SUFFIX = ".fna";

export interface SkippedEntry {
  name: string;
  reason: string;
}

export interface SampleDiscovery {
  samples: Sample[];
  skipped: SkippedEntry[];
}

/** Sample identifier: the base name up to its first `.`. */
export function deriveSampleId(fileName: string): string {
  const base = path.basename(fileName);
  const dot = base.indexOf(".");
  return dot === -1 ? base : base.slice(0, dot);
}

export function isSequenceFileName(fileName: string): boolean {
  return fileName.endsWith(SEQUENCE_SUFFIX) && deriveSampleId(fileName).length > 0;
}

/**
 * Lists `inputDir` (non-recursive) and returns one sample per regular `.fna` file.
 * Throws a PreconditionFailure when two files map to the same identifier.
 */
export async function discoverSamples(inputDir: string): Promise<SampleDiscovery> {
  const root = path.resolve(inputDir);
  const samples: Sample[] = [];
  const skipped: SkippedEntry[] = [];
  const owners = new Map<string, string>();

  for (const name of await listEntries(root)) {
    const fullPath = path.join(root, name);
    if (!isSequenceFileName(name)) {
      skipped.push({ name, reason: `not a ${SEQUENCE_SUFFIX} file` });
      continue;
    }
    if (!(await isRegularFile(fullPath))) {
      skipped.push({ name, reason: "not a regular file" });
      continue;
    }

    const id = deriveSampleId(name);
    const owner = owners.get(id);
    if (owner) {
      throw new PipelineError(
        "PreconditionFailure",
        `Duplicate sample identifier "${id}" derived from ${owner} and ${name}`
      );
    }
    owners.set(id, name);
    samples.push({ id, fileName: name, path: fullPath });
  }

  return { samples, skipped };
}
