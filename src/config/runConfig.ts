import path from "path";
import { z } from "zod";

export const KINGDOMS = ["Bacteria", "Archaea", "Viruses", "Mitochondria", "Plasmids"] as const;

export const KingdomSchema = z.enum(KINGDOMS);
export const LaunchFailurePolicySchema = z.enum(["abort", "continue"]);

const DirSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => path.resolve(value));

export const RunConfigSchema = z.object({
  inputDir: DirSchema,
  outputDir: DirSchema,
  threads: z.number().int().positive().default(4),
  kingdom: KingdomSchema.default("Bacteria"),
  species: z.string().trim().min(1),
  annotate: z.boolean().default(true),
  launchFailurePolicy: LaunchFailurePolicySchema.default("abort"),
  toolTimeoutMs: z.number().int().positive().optional(),
  keepWorkDir: z.boolean().default(false),
  tools: z
    .object({
      annotation: z.string().min(1).default("prokka"),
      amr: z.string().min(1).default("abritamr")
    })
    .default({})
});

export type Kingdom = z.infer<typeof KingdomSchema>;
export type LaunchFailurePolicy = z.infer<typeof LaunchFailurePolicySchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RunConfig = Readonly<z.output<typeof RunConfigSchema>>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
    .join("; ");
}

export function parseRunConfig(input: RunConfigInput): RunConfig {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid run configuration: ${formatZodIssues(parsed.error)}`);
  }
  return Object.freeze({ ...parsed.data, tools: Object.freeze({ ...parsed.data.tools }) });
}
