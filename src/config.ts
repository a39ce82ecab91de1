import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import JSON5 from "json5";
import { BUILTIN_CATALOG, type ModelCatalog } from "./catalog.js";
import { DEFAULT_LOG_LEVEL, Logger } from "./logger.js";
import { ModelCorrector } from "./model-corrector.js";
import { formatIssue } from "./schemas/catalog.js";
import { CorrectorConfigSchema, type CorrectorConfig } from "./schemas/config.js";
import { DEFAULT_MIN_PREFIX_SCORE } from "./utils/model-resolver.js";

export type { CorrectorConfig } from "./schemas/config.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function defaultConfig(): CorrectorConfig {
  return {
    minPrefixScore: DEFAULT_MIN_PREFIX_SCORE,
    logLevel: DEFAULT_LOG_LEVEL,
    providers: {},
  };
}

export async function loadConfig(
  configPath: string,
  logger: Logger,
): Promise<CorrectorConfig> {
  const absolutePath = isAbsolute(configPath)
    ? configPath
    : resolve(process.cwd(), configPath);

  if (!existsSync(absolutePath)) {
    logger.warn(`No config file at ${absolutePath}, using defaults`);
    return defaultConfig();
  }

  logger.info(`Reading config from ${absolutePath}`);

  const text = await readFile(absolutePath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError("Config file must contain a JSON5 object");
  }

  const parseResult = CorrectorConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    throw new ConfigError(`Invalid config ${formatIssue(parseResult.error)}`);
  }

  const config = parseResult.data;
  const extraModels = Object.values(config.providers).reduce(
    (sum, models) => sum + models.length,
    0,
  );
  logger.info(
    `Loaded ${String(extraModels)} extra model(s) for ${String(Object.keys(config.providers).length)} provider(s)`,
  );

  return config;
}

export function catalogFromConfig(
  config: CorrectorConfig,
  base: ModelCatalog = BUILTIN_CATALOG,
): ModelCatalog {
  return base.withAdditions(config.providers);
}

export function createCorrectorFromConfig(
  config: CorrectorConfig,
  logger?: Logger,
): ModelCorrector {
  return new ModelCorrector({
    catalog: catalogFromConfig(config),
    logger: logger?.child("model-correction") ?? new Logger(config.logLevel, "model-correction"),
    minPrefixScore: config.minPrefixScore,
  });
}
