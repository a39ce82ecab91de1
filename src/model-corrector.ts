import { BUILTIN_CATALOG } from "./catalog.js";
import { DEFAULT_LOG_LEVEL, Logger } from "./logger.js";
import { DEFAULT_MIN_PREFIX_SCORE, findClosestModel } from "./utils/model-resolver.js";

export interface ModelLookup {
  lookup(provider: string): readonly string[];
}

export interface ModelCorrectorOptions {
  catalog?: ModelLookup;
  logger?: Logger;
  minPrefixScore?: number;
}

/**
 * Maps a possibly misspelled model id onto a known model for its provider.
 *
 * `correct` never throws: when the model can't be matched, or anything goes
 * wrong while matching, the requested id comes back unchanged.
 */
export class ModelCorrector {
  private readonly catalog: ModelLookup;
  private readonly logger: Logger;
  private readonly minPrefixScore: number;

  constructor(options: ModelCorrectorOptions = {}) {
    this.catalog = options.catalog ?? BUILTIN_CATALOG;
    this.logger = options.logger ?? new Logger(DEFAULT_LOG_LEVEL, "model-correction");
    this.minPrefixScore = options.minPrefixScore ?? DEFAULT_MIN_PREFIX_SCORE;
  }

  // correctionModel is only logged for now; matching is prefix-based.
  correct(provider: string, model: string, correctionModel: string): string {
    try {
      this.logger.info("Model correction request", { provider, model, correctionModel });
      return this.resolve(provider, model);
    } catch (err) {
      this.logger.error("Error in model correction, keeping requested model", {
        provider,
        model,
        error: err instanceof Error ? err.message : String(err),
      });
      return model;
    }
  }

  private resolve(provider: string, model: string): string {
    const candidates = this.catalog.lookup(provider);
    this.logger.debug("Catalog lookup", { provider, candidates: candidates.length });

    if (candidates.length === 0) {
      this.logger.warn(`Unknown provider "${provider}", keeping "${model}"`);
      return model;
    }

    if (candidates.includes(model)) {
      this.logger.debug(`Model "${model}" is already valid`);
      return model;
    }

    const match = findClosestModel(model, candidates, this.minPrefixScore);
    if (!match) {
      this.logger.warn(`No model close enough to "${model}" for "${provider}", keeping it`, {
        minPrefixScore: this.minPrefixScore,
      });
      return model;
    }

    this.logger.info(`Model "${model}" corrected to "${match.model}"`, {
      provider,
      score: match.score,
    });
    return match.model;
  }
}

let defaultCorrector: ModelCorrector | undefined;

export function correctModel(provider: string, model: string, correctionModel: string): string {
  defaultCorrector ??= new ModelCorrector();
  return defaultCorrector.correct(provider, model, correctionModel);
}
