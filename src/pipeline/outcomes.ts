import type { PipelineErrorKind } from "../errors";
import type { ItemOutcome } from "../types/runReport";

export function okItem(item: string, message: string | null = null): ItemOutcome {
  return { item, status: "ok", kind: null, message };
}

export function failedItem(item: string, kind: PipelineErrorKind, message: string): ItemOutcome {
  return { item, status: "failed", kind, message };
}

export function skippedItem(item: string, message: string): ItemOutcome {
  return { item, status: "skipped", kind: null, message };
}

export function countFailures(items: ItemOutcome[]): number {
  return items.filter((item) => item.status === "failed").length;
}
