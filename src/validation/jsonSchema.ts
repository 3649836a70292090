import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import runReportSchema from "../../contracts/schemas/run_report.schema.json";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validatorCache = new Map<string, ValidateFunction>();

export function getSchemaValidator(schemaId: string, schema: SchemaObject): ValidateFunction {
  const cached = validatorCache.get(schemaId);
  if (cached) return cached;
  const validator = ajv.compile(schema);
  validatorCache.set(schemaId, validator);
  return validator;
}

export function getRunReportValidator(): ValidateFunction {
  return getSchemaValidator("run_report", runReportSchema);
}

export function assertValidSchema(
  validator: ValidateFunction,
  data: unknown,
  label: string
): void {
  const valid = validator(data);
  if (valid) return;
  const errors = (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message}`)
    .join("; ");
  throw new Error(`${label} failed schema validation: ${errors}`);
}
