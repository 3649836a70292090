export type PipelineErrorKind =
  | "ItemFailure"
  | "LaunchFailure"
  | "PreconditionFailure"
  | "Cancelled";

export interface PipelineErrorOptions {
  command?: string;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly command?: string;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.command = options.command;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export const EXIT_CODES = {
  ok: 0,
  unexpected: 1,
  launchFailure: 3,
  preconditionFailure: 4,
  cancelled: 130
} as const;

export function exitCodeForKind(kind: PipelineErrorKind): number {
  switch (kind) {
    case "LaunchFailure":
      return EXIT_CODES.launchFailure;
    case "PreconditionFailure":
      return EXIT_CODES.preconditionFailure;
    case "Cancelled":
      return EXIT_CODES.cancelled;
    case "ItemFailure":
      return EXIT_CODES.unexpected;
  }
}
