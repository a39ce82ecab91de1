import { z } from "zod";
import { DEFAULT_LOG_LEVEL, LEVEL_PRIORITY, isLogLevel, type LogLevel } from "../logger.js";
import { DEFAULT_MIN_PREFIX_SCORE } from "../utils/model-resolver.js";
import { ModelListSchema } from "./catalog.js";

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === "string" && isLogLevel(value),
  `logLevel must be one of: ${Object.keys(LEVEL_PRIORITY).join(", ")}`,
);

export const CorrectorConfigSchema = z.object({
  minPrefixScore: z
    .number()
    .int("minPrefixScore must be a whole number")
    .positive()
    .default(DEFAULT_MIN_PREFIX_SCORE),
  logLevel: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
  providers: z
    .record(z.string().trim().min(1, "Provider name cannot be empty"), ModelListSchema)
    // Keys differing only in case name the same provider; their lists are merged.
    .transform((providers) => {
      const merged: Record<string, string[]> = {};
      for (const [name, models] of Object.entries(providers)) {
        const key = name.toLowerCase();
        const existing = merged[key] ?? [];
        merged[key] = [...existing, ...models.filter((m) => !existing.includes(m))];
      }
      return merged;
    })
    .default({}),
});

export type CorrectorConfig = z.infer<typeof CorrectorConfigSchema>;
