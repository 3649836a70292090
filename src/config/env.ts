import { z } from "zod";
import { formatZodIssues } from "./runConfig";

function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema.optional());
}

const EnvSchema = z.object({
  PROKKA_BIN: optional(z.string()),
  ABRITAMR_BIN: optional(z.string()),
  AMR_PIPELINE_TOOL_TIMEOUT_MS: optional(z.coerce.number().int().positive()),
  NCBI_EMAIL: optional(z.string().email()),
  NCBI_API_KEY: optional(z.string())
});

export type PipelineEnv = z.infer<typeof EnvSchema>;

export function loadEnv(env: NodeJS.ProcessEnv = process.env): PipelineEnv {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}
