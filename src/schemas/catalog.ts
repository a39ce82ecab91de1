import { z } from "zod";

const ModelNameSchema = z.string().trim().min(1, "Model name cannot be empty");

export const ModelListSchema = z
  .array(ModelNameSchema)
  .min(1, "Provider must list at least one model");

export const CatalogSchema = z.record(
  z.string().trim().min(1, "Provider name cannot be empty"),
  ModelListSchema,
);

export function formatIssue(error: z.ZodError): string {
  const first = error.issues[0];
  if (!first) return "validation failed";
  const path = first.path.map(String).join(".");
  return path ? `at "${path}": ${first.message}` : first.message;
}
